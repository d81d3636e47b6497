import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { runCli } from '../cli.js';
import { ResourceUnavailableError, StartupError } from '../errors.js';
import { MemoryKVClient } from '../kv/MemoryKVClient.js';
import { MemoryLogger } from '../logging/Logger.js';
import type { RegisterCallback } from '../plugin-engine/PluginRegistry.js';
import type { CommandContext, CommandTable, DataStorage } from '../plugin-engine/types.js';
import { DirectoryContentSource, DirectorySourceDefaults } from '../plugins/sources/DirectoryContentSource.js';
import { DurableTaskExecutionProvider } from '../plugins/providers/TaskExecutionProviders.js';
import { MemoryDataStorage } from '../storage/DataStorage.js';
import { DurableTaskQueue } from '../tasks/DurableTaskQueue.js';
import { Application, type PluginModule } from './Application.js';

const directoryModule: PluginModule = {
    origin: 'test:directory',
    module: {
        registerConfigurationProvider(register: RegisterCallback) {
            register(new DirectorySourceDefaults());
        },
        registerContentSource(register: RegisterCallback) {
            register(new DirectoryContentSource());
        },
    },
};

function memoryStorage(storage: DataStorage): MemoryDataStorage {
    if (!(storage instanceof MemoryDataStorage)) {
        throw new Error('expected the in-memory data storage');
    }
    return storage;
}

describe('Application', () => {
    let dir: string;
    let logger: MemoryLogger;
    let application: Application;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsift-app-'));
        await fs.writeFile(path.join(dir, 'notes.txt'), 'Quarterly notes\nSecond line');
        await fs.writeFile(
            path.join(dir, 'page.html'),
            '<html><head><title>Home</title></head><body><p>Hello &amp; welcome</p></body></html>'
        );
        await fs.writeFile(path.join(dir, 'skip.bin'), Buffer.from([0, 1, 2]));
        logger = new MemoryLogger();
        application = new Application({ logger });
    });

    afterEach(async () => {
        await application.stop();
        await fs.rm(dir, { recursive: true, force: true });
    });

    function directoryConfig(): Record<string, unknown> {
        return { plugins: { directory_watcher: { path: dir, file_extensions: ['.txt', '.html'] } } };
    }

    it('should reject an unknown profile', async () => {
        await expect(application.bootstrap({ profile: 'staging' })).rejects.toBeInstanceOf(StartupError);
    });

    it('should refuse singletons before start', async () => {
        await application.bootstrap({ profile: 'test' });
        expect(() => application.getSingletons()).to.throw(ResourceUnavailableError, 'Application has not been started');
    });

    it('should bootstrap only once', async () => {
        await application.bootstrap({ profile: 'test' });
        const count = application.registry.count();
        await application.bootstrap({ profile: 'test', modules: [directoryModule] });
        expect(application.registry.count()).to.equal(count);
    });

    it('should run discovered files through fetch and extraction once each', async () => {
        await application.bootstrap({ profile: 'test', modules: [directoryModule] });
        const singletons = await application.start(directoryConfig());

        expect(application.isRunning()).to.be.true;
        const items = memoryStorage(singletons.dataStorage).list();
        expect(items.map(item => item.id)).to.deep.equal(['item_1', 'item_2']);

        const [notes, page] = items;
        expect(notes.content).to.equal('Quarterly notes\nSecond line');
        expect(notes.metadata.sourceUrl).to.equal(pathToFileURL(path.join(dir, 'notes.txt')).href);
        expect(notes.metadata.title).to.equal('notes.txt');
        expect(notes.metadata.mimeType).to.equal('text/plain');
        expect(notes.metadata.processingState).to.equal('extracted');
        expect(notes.metadata.extra.source_plugin).to.equal('directory_watcher');

        expect(page.content).to.equal('Home Hello & welcome');
        expect(page.metadata.title).to.equal('Home');
        expect(page.metadata.mimeType).to.equal('text/plain');
        expect(page.metadata.extra.sourceMimeType).to.equal('text/html');
    });

    it('should describe itself for workers', async () => {
        await application.bootstrap({ profile: 'test' });
        await application.start({ answer: 1 });
        expect(application.describe()).to.deep.equal({ profile: 'test', userConfig: { answer: 1 } });
    });

    it('should run every reset action and record failures', async () => {
        await application.bootstrap({
            profile: 'test',
            modules: [
                directoryModule,
                {
                    origin: 'test:reset',
                    module: {
                        registerResetAction(register: RegisterCallback) {
                            register({
                                pluginId: 'broken_reset',
                                hardReset() {
                                    throw new Error('cannot reset');
                                },
                                softReset() {},
                            });
                        },
                    },
                },
            ],
        });
        const singletons = await application.start(directoryConfig());
        expect(memoryStorage(singletons.dataStorage).list()).to.have.length(2);

        const outcomes = await application.reset(true);

        expect(outcomes).to.deep.equal([
            { pluginId: 'storage_reset', status: 'ok' },
            { pluginId: 'task_queue_reset', status: 'ok' },
            { pluginId: 'broken_reset', status: 'failed', error: 'cannot reset' },
        ]);
        expect(memoryStorage(singletons.dataStorage).list()).to.deep.equal([]);
    });

    it('should log instead of scheduling when task execution is synchronous', async () => {
        await application.bootstrap({ profile: 'test', modules: [directoryModule] });
        const singletons = await application.start({
            providers: { task_execution: 'synchronous' },
            plugins: { directory_watcher: { path: dir, file_extensions: ['.txt'] } },
        });

        expect(singletons.taskQueue).to.equal(null);
        expect(memoryStorage(singletons.dataStorage).list()).to.deep.equal([]);
        expect(logger.messages('info')).to.include(
            `Synchronous execution: would fetch ${pathToFileURL(path.join(dir, 'notes.txt')).href}`
        );
    });

    it('should keep the first command registered under a name', async () => {
        const replacement = {
            name: 'status',
            description: 'replacement',
            run: async () => 7,
        };
        await application.bootstrap({
            profile: 'test',
            modules: [
                {
                    origin: 'test:commands',
                    module: {
                        registerCommandRegistrar(register: RegisterCallback) {
                            register({ registerCommands: (table: CommandTable) => table.add(replacement) });
                        },
                    },
                },
            ],
        });

        const commands = application.getCommands();
        expect([...commands.keys()]).to.deep.equal(['run', 'worker', 'reset', 'status', 'validate', 'version', 'config']);
        expect(commands.get('status')?.description).to.not.equal('replacement');
        expect(logger.messages('warn')).to.include("Command 'status' is already registered, ignoring duplicate");
    });
});

describe('core commands', () => {
    let logger: MemoryLogger;
    let application: Application;
    let output: string[];

    function context(args: string[]): CommandContext {
        return {
            args,
            logger,
            application,
            signal: new AbortController().signal,
            print: line => output.push(line),
        };
    }

    async function run(name: string, args: string[] = []): Promise<number> {
        const command = application.getCommands().get(name);
        if (!command) {
            throw new Error(`no command ${name}`);
        }
        return command.run(context(args));
    }

    beforeEach(async () => {
        logger = new MemoryLogger();
        application = new Application({ logger });
        output = [];
        await application.bootstrap({ profile: 'test' });
    });

    afterEach(async () => {
        await application.stop();
    });

    it('should print the merged configuration', async () => {
        expect(await run('config')).to.equal(0);
        expect(output).to.deep.equal([
            [
                'providers:',
                '  cache: memory',
                '  state_storage: memory',
                '  data_storage: memory',
                '  task_execution: immediate',
            ].join('\n'),
        ]);
        expect(application.getState()).to.equal('UNINITIALIZED');
    });

    it('should print one configuration value', async () => {
        expect(await run('config', ['providers.cache'])).to.equal(0);
        expect(output).to.deep.equal(['memory']);
    });

    it('should fail for a missing configuration key', async () => {
        expect(await run('config', ['providers.nothing'])).to.equal(1);
        expect(logger.messages('error')).to.include("No configuration value at 'providers.nothing'");
    });

    it('should report status as JSON', async () => {
        expect(await run('status', ['--json'])).to.equal(0);
        const { health, ...status } = JSON.parse(output[0]);
        expect(status).to.deep.equal({
            state: 'SINGLETONS_READY',
            registrations: {
                ConfigurationProvider: 1,
                CacheProvider: 1,
                StateStorageProvider: 1,
                DataStorageProvider: 1,
                TaskExecutionProvider: 2,
                ContentSource: 0,
                ContentExtractor: 2,
                ContentFetcher: 2,
                LifecycleAction: 1,
                ResetAction: 2,
                CommandRegistrar: 1,
            },
            taskExecution: 'immediate',
            queue: null,
        });
        expect(health.status).to.equal('healthy');
        expect(health.errors).to.deep.equal([]);
        expect(health.metrics).to.deep.equal({ total_registrations: 14 });
        expect(health.components.task_queue).to.deep.equal({
            status: 'healthy',
            details: { mode: 'immediate', type: 'ImmediateTaskQueue' },
        });
        expect(health.components.data_storage).to.deep.equal({
            status: 'healthy',
            details: { type: 'MemoryDataStorage' },
        });
    });

    it('should print the health report after the registrations', async () => {
        expect(await run('status')).to.equal(0);
        expect(output.slice(0, 2)).to.deep.equal(['State: SINGLETONS_READY', 'Task execution: immediate']);
        const report = output[output.length - 1].split('\n');
        expect(report.slice(0, 2)).to.deep.equal(['docsift system health', 'Status: HEALTHY']);
        expect(report).to.include('  task_queue: HEALTHY');
        expect(report).to.include('    mode: immediate');
        expect(report.slice(-2)).to.deep.equal(['METRICS:', '  total_registrations: 14']);
    });

    it('should report a disabled task queue as degraded', async () => {
        await application.startToSingletons({ providers: { task_execution: 'synchronous' } });
        expect(await run('status', ['--json'])).to.equal(0);
        const { taskExecution, health } = JSON.parse(output[0]);
        expect(taskExecution).to.equal('synchronous');
        expect(health.status).to.equal('degraded');
        expect(health.components.task_queue).to.deep.equal({ status: 'disabled', details: { mode: 'synchronous' } });
    });

    it('should pass validation on in-memory backends', async () => {
        expect(await run('validate')).to.equal(0);
        expect(output).to.deep.equal([
            '✓ configuration',
            '✓ plugins',
            '✓ task_queue',
            '✓ cache',
            '✓ state_storage',
            '✓ data_storage',
            'All validation checks passed!',
        ]);
        expect(application.getState()).to.equal('UNINITIALIZED');
    });

    it('should fail validation when a backend cannot be built', async () => {
        const failing = new Application({ logger });
        await failing.bootstrap({
            profile: 'test',
            modules: [
                {
                    origin: 'test:broken-cache',
                    module: {
                        registerConfigurationProvider(register: RegisterCallback) {
                            register({
                                getConfigurationId: () => 'broken',
                                getDefaultConfiguration: () => ({ providers: { cache: 'missing' } }),
                            });
                        },
                    },
                },
            ],
        });

        const command = failing.getCommands().get('validate');
        expect(await command?.run({ ...context([]), application: failing })).to.equal(1);
        expect(output).to.deep.equal([]);
        expect(logger.messages('error')).to.include(
            "Validation failed: providers.cache names unknown provider 'missing' (available: memory)"
        );
    });

    it('should print the version', async () => {
        expect(await run('version')).to.equal(0);
        expect(output).to.deep.equal(['docsift 0.1.0']);
    });

    it('should print one line per reset outcome', async () => {
        expect(await run('reset', ['--hard'])).to.equal(0);
        expect(output).to.deep.equal(['storage_reset: ok', 'task_queue_reset: ok']);
    });

    it('should refuse to work without a durable queue', async () => {
        expect(await run('worker', ['--once'])).to.equal(1);
        expect(logger.messages('error')).to.include(
            'The worker needs a durable task queue (providers.task_execution: durable)'
        );
    });

    it('should dispatch through the command line', async () => {
        const signal = new AbortController().signal;
        const print = (line: string) => output.push(line);

        expect(await runCli(application, ['config', 'providers.data_storage'], { logger, signal, print })).to.equal(0);
        expect(await runCli(application, ['explode'], { logger, signal, print })).to.equal(1);
        expect(output).to.deep.equal(['memory']);
        expect(logger.messages('error')).to.include(
            "Unknown command 'explode' (available: run, worker, reset, status, validate, version, config)"
        );

        output.length = 0;
        expect(await runCli(application, ['help'], { logger, signal, print })).to.equal(0);
        expect(output[0]).to.equal('Usage: docsift <command> [options]');
        expect(output).to.have.length(8);
    });
});

describe('configuration commands', () => {
    let configDir: string;
    let logger: MemoryLogger;
    let application: Application;
    let output: string[];

    async function run(args: string[]): Promise<number> {
        const command = application.getCommands().get('config');
        if (!command) {
            throw new Error('no config command');
        }
        return command.run({
            args,
            logger,
            application,
            signal: new AbortController().signal,
            print: line => output.push(line),
        });
    }

    beforeEach(async () => {
        configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsift-config-'));
        logger = new MemoryLogger();
        application = new Application({ logger, configDir });
        output = [];
        await application.bootstrap({ profile: 'test', modules: [directoryModule] });
    });

    afterEach(async () => {
        await application.stop();
        await fs.rm(configDir, { recursive: true, force: true });
    });

    it('should list configuration ids and their overrides', async () => {
        await fs.writeFile(path.join(configDir, 'directory_watcher.yaml'), 'plugins: {}\n');

        expect(await run(['list'])).to.equal(0);
        expect(output).to.deep.equal(['profile:test', 'directory_watcher (overridden)']);

        output.length = 0;
        expect(await run(['list', '--json'])).to.equal(0);
        expect(JSON.parse(output[0])).to.deep.equal({
            configurations: [
                { id: 'profile:test', plugin: 'profile_test_configuration', hasOverride: false },
                { id: 'directory_watcher', plugin: 'directory_watcher_defaults', hasOverride: true },
            ],
        });
    });

    it('should show the merged values under the paths a provider declares', async () => {
        await fs.writeFile(
            path.join(configDir, 'directory_watcher.yaml'),
            'plugins:\n  directory_watcher:\n    path: /srv/docs\n    watch: true\n'
        );

        expect(await run(['show', 'directory_watcher', '--json'])).to.equal(0);
        expect(JSON.parse(output[0])).to.deep.equal({
            directory_watcher: {
                plugins: {
                    directory_watcher: {
                        path: '/srv/docs',
                        recursive: true,
                        file_extensions: [],
                        watch: true,
                        stability_threshold_ms: 2000,
                    },
                },
            },
        });
    });

    it('should show every provider without ids', async () => {
        expect(await run(['show', '--json'])).to.equal(0);
        const shown = JSON.parse(output[0]);
        expect(Object.keys(shown)).to.deep.equal(['profile:test', 'directory_watcher']);
        expect(shown['profile:test']).to.deep.equal({
            providers: { cache: 'memory', state_storage: 'memory', data_storage: 'memory', task_execution: 'immediate' },
        });
    });

    it('should reject an unknown configuration id', async () => {
        expect(await run(['show', 'nope'])).to.equal(1);
        expect(logger.messages('error')).to.deep.equal([
            "Configuration ID 'nope' not found. Available IDs: profile:test, directory_watcher",
        ]);
        expect(output).to.deep.equal([]);
    });

    it('should reset one override file', async () => {
        await fs.writeFile(path.join(configDir, 'directory_watcher.yaml'), 'plugins: {}\n');

        expect(await run(['reset', 'directory_watcher'])).to.equal(0);
        expect(await run(['reset', 'directory_watcher'])).to.equal(0);

        expect(output).to.deep.equal([
            "Reset configuration for 'directory_watcher'",
            "No override file found for 'directory_watcher' (already at default)",
        ]);
        expect(await fs.readdir(configDir)).to.deep.equal([]);
    });

    it('should reset every override file', async () => {
        await fs.writeFile(path.join(configDir, 'b.yml'), 'x: 1\n');
        await fs.writeFile(path.join(configDir, 'a.yaml'), 'y: 2\n');
        await fs.writeFile(path.join(configDir, 'notes.txt'), 'keep');

        expect(await run(['reset', '--all'])).to.equal(0);
        expect(await run(['reset', '--all'])).to.equal(0);

        expect(output).to.deep.equal([
            'Deleted: a.yaml',
            'Deleted: b.yml',
            'Reset all configuration overrides (2 files)',
            'No configuration override files found.',
        ]);
        expect(await fs.readdir(configDir)).to.deep.equal(['notes.txt']);
    });

    it('should want exactly one of an id and --all', async () => {
        expect(await run(['reset'])).to.equal(1);
        expect(await run(['reset', 'directory_watcher', '--all'])).to.equal(1);
        expect(logger.messages('error')).to.deep.equal([
            'Give exactly one configuration id, or --all',
            'Give exactly one configuration id, or --all',
        ]);
    });

    it('should read a key through the get subcommand', async () => {
        expect(await run(['get', 'providers.cache'])).to.equal(0);
        expect(output).to.deep.equal(['memory']);
    });
});

describe('durable execution', () => {
    let dir: string;
    let application: Application;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsift-durable-'));
        await fs.writeFile(path.join(dir, 'a.txt'), 'Alpha');
        await fs.writeFile(path.join(dir, 'b.md'), '# Beta');
        application = new Application({ logger: new MemoryLogger() });
    });

    afterEach(async () => {
        await application.stop();
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('should queue fetches on start and let a worker drain them', async () => {
        const client = new MemoryKVClient();
        const shared = new MemoryDataStorage();
        await application.bootstrap({
            profile: 'test',
            modules: [
                directoryModule,
                {
                    origin: 'test:durable',
                    module: {
                        registerTaskExecutionProvider(register: RegisterCallback) {
                            register(new DurableTaskExecutionProvider(async () => client));
                        },
                        registerDataStorageProvider(register: RegisterCallback) {
                            register({ providerId: 'shared', createDataStorage: () => shared });
                        },
                    },
                },
            ],
        });

        const singletons = await application.start({
            providers: { task_execution: 'durable', data_storage: 'shared' },
            plugins: { directory_watcher: { path: dir } },
        });
        const queue = singletons.taskQueue;
        if (!(queue instanceof DurableTaskQueue)) {
            throw new Error('expected a durable queue');
        }
        expect(await queue.store.stats()).to.deep.equal({ pending: 2, processing: 0, failed: 0 });
        expect(shared.list()).to.deep.equal([]);

        const worker = application.getCommands().get('worker');
        const code = await worker?.run({
            args: ['--once'],
            logger: new MemoryLogger(),
            application,
            signal: new AbortController().signal,
            print: () => undefined,
        });

        expect(code).to.equal(0);
        expect(await queue.store.stats()).to.deep.equal({ pending: 0, processing: 0, failed: 0 });
        expect(shared.list().map(item => item.metadata.title).sort()).to.deep.equal(['a.txt', 'b.md']);
        expect(shared.list().every(item => item.metadata.processingState === 'extracted')).to.be.true;
    });
});
