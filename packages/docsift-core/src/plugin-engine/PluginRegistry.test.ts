import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { MemoryLogger } from '../logging/Logger.js';
import { PluginRegistry, type RegistrationRejectedEvent } from './PluginRegistry.js';
import { missingCapabilities } from './capabilities.js';
import type { ContentFetcher, LifecycleAction, Registration } from './types.js';

function fetcher(): ContentFetcher {
    return {
        canFetch: () => true,
        fetch: async () => undefined,
    };
}

class NamedAction implements LifecycleAction {
    async onStart(): Promise<void> {}
    async onStop(): Promise<void> {}
}

describe('PluginRegistry', () => {
    let logger: MemoryLogger;
    let registry: PluginRegistry;

    beforeEach(() => {
        logger = new MemoryLogger();
        registry = new PluginRegistry(logger);
    });

    describe('register', () => {
        it('should reject an implementation missing a required capability', () => {
            const rejected: RegistrationRejectedEvent[] = [];
            registry.on('rejected', (event: RegistrationRejectedEvent) => rejected.push(event));

            const ok = registry.register('ContentSource', { discoverContent: () => [], startSource: () => undefined });

            expect(ok).to.be.false;
            expect(registry.count()).to.equal(0);
            expect(rejected).to.have.length(1);
            expect(rejected[0].error.missing).to.deep.equal(['stopSource', 'getConfigurationId']);
            expect(logger.messages('warn')).to.deep.equal([
                'Cannot register plugin as ContentSource: missing stopSource, getConfigurationId',
            ]);
        });

        it('should reject values that are not objects', () => {
            expect(registry.register('ContentFetcher', null)).to.be.false;
            expect(missingCapabilities('ContentFetcher', 42)).to.deep.equal(['canFetch', 'fetch']);
        });

        it('should keep registration order', () => {
            registry.register('ContentFetcher', fetcher(), { pluginId: 'first' });
            registry.register('ContentFetcher', fetcher(), { pluginId: 'second' });
            expect(registry.getRegistrations('ContentFetcher').map(r => r.pluginId)).to.deep.equal([
                'first',
                'second',
            ]);
        });

        it('should accept the same object twice with one identity', () => {
            const shared = fetcher();
            registry.register('ContentFetcher', shared, { origin: 'mod' });
            registry.register('ContentFetcher', shared, { origin: 'mod' });

            const records = registry.getRegistrations('ContentFetcher');
            expect(records).to.have.length(2);
            expect(records[0].pluginId).to.equal(records[1].pluginId);
            expect(records[0].implementation).to.equal(records[1].implementation);
        });

        it('should prefer an explicit id, then the plugin own id, then a derived one', () => {
            registry.register('LifecycleAction', new NamedAction(), { origin: 'mod', pluginId: 'explicit' });
            registry.register('LifecycleAction', Object.assign(new NamedAction(), { pluginId: 'own' }), {
                origin: 'mod',
            });
            registry.register('LifecycleAction', new NamedAction(), { origin: 'mod' });
            registry.register('LifecycleAction', new NamedAction(), { origin: 'mod' });

            expect(registry.getRegistrations('LifecycleAction').map(r => r.pluginId)).to.deep.equal([
                'explicit',
                'own',
                'mod#NamedAction',
                'mod#NamedAction#2',
            ]);
        });

        it('should hand out snapshot copies', () => {
            registry.register('ContentFetcher', fetcher(), { pluginId: 'f' });
            const records: Registration<'ContentFetcher'>[] = registry.getRegistrations('ContentFetcher');
            records[0].pluginId = 'changed';
            records.pop();

            expect(registry.getRegistrations('ContentFetcher').map(r => r.pluginId)).to.deep.equal(['f']);
            expect(registry.getContentFetchers()).to.have.length(1);
        });
    });

    describe('registerPlugin', () => {
        it('should register an object under every extension point it satisfies', () => {
            const plugin = {
                pluginId: 'multi',
                canFetch: () => true,
                fetch: async () => undefined,
                onStart: async () => undefined,
                onStop: async () => undefined,
            };

            expect(registry.registerPlugin(plugin)).to.deep.equal(['ContentFetcher', 'LifecycleAction']);
            expect(registry.getRegistrations('ContentFetcher')[0].pluginId).to.equal('multi');
            expect(registry.getRegistrations('LifecycleAction')[0].pluginId).to.equal('multi');
        });

        it('should reject an object that satisfies nothing', () => {
            expect(registry.registerPlugin({ onStart: async () => undefined })).to.deep.equal([]);
            expect(registry.count()).to.equal(0);
        });
    });

    describe('loadModule', () => {
        it('should run every exported hook and keep going after a throwing one', async () => {
            const module = {
                registerContentFetcher(register: (impl: unknown, options?: { pluginId?: string }) => boolean) {
                    register(fetcher(), { pluginId: 'mod_fetcher' });
                    register({ canFetch: () => true });
                },
                registerLifecycleAction() {
                    throw new Error('hook exploded');
                },
                registerPlugin(register: (impl: unknown) => boolean) {
                    register(new NamedAction());
                },
            };

            const accepted = await registry.loadModule(module, 'test-module');

            expect(accepted).to.equal(2);
            expect(registry.getRegistrations('ContentFetcher').map(r => r.origin)).to.deep.equal(['test-module']);
            expect(registry.getRegistrations('LifecycleAction').map(r => r.pluginId)).to.deep.equal([
                'test-module#NamedAction',
            ]);
            expect(logger.messages('error')).to.deep.equal([
                "Plugin 'test-module' failed in registerLifecycleAction: hook exploded",
            ]);
        });

        it('should ignore values that are not modules', async () => {
            expect(await registry.loadModule(undefined, 'nothing')).to.equal(0);
        });
    });

    describe('discover', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsift-plugins-'));
        });

        afterEach(async () => {
            await fs.rm(dir, { recursive: true, force: true });
        });

        it('should import module files of a directory in name order', async () => {
            await fs.writeFile(
                path.join(dir, 'b-fetcher.mjs'),
                [
                    'export function registerContentFetcher(register) {',
                    "    register({ canFetch() { return true; }, async fetch() {} }, { pluginId: 'b_fetcher' });",
                    '}',
                ].join('\n')
            );
            await fs.writeFile(
                path.join(dir, 'a-fetcher.mjs'),
                [
                    'export function registerContentFetcher(register) {',
                    "    register({ canFetch() { return true; }, async fetch() {} }, { pluginId: 'a_fetcher' });",
                    '}',
                ].join('\n')
            );
            await fs.writeFile(path.join(dir, 'notes.txt'), 'not a module');
            await fs.writeFile(path.join(dir, 'a-fetcher.test.mjs'), 'throw new Error("never imported");');

            const accepted = await registry.discover([dir, path.join(dir, 'missing')]);

            expect(accepted).to.equal(2);
            expect(registry.getRegistrations('ContentFetcher').map(r => r.pluginId)).to.deep.equal([
                'a_fetcher',
                'b_fetcher',
            ]);
            expect(registry.getRegistrations('ContentFetcher')[0].origin).to.equal(path.join(dir, 'a-fetcher.mjs'));
            expect(logger.messages('warn')).to.deep.equal([`Plugin path ${path.join(dir, 'missing')} does not exist`]);
        });

        it('should skip a path that cannot be read and keep discovering', async () => {
            const file = path.join(dir, 'plain.txt');
            await fs.writeFile(file, 'not a directory');
            await fs.writeFile(
                path.join(dir, 'fetcher.mjs'),
                [
                    'export function registerContentFetcher(register) {',
                    "    register({ canFetch() { return true; }, async fetch() {} }, { pluginId: 'late_fetcher' });",
                    '}',
                ].join('\n')
            );

            const unreadable = path.join(file, 'child');
            const accepted = await registry.discover([unreadable, path.join(dir, 'fetcher.mjs')]);

            expect(accepted).to.equal(1);
            expect(registry.getRegistrations('ContentFetcher').map(r => r.pluginId)).to.deep.equal(['late_fetcher']);
            expect(logger.messages('error')).to.deep.equal([
                `Cannot read plugin path ${unreadable}: ENOTDIR: not a directory, stat '${unreadable}'`,
            ]);
        });
    });
});
