/**
 * Plugin Registry
 *
 * Holds every extension-point registration in registration order. Each
 * implementation is checked against its extension point's capability set
 * before it is accepted, and is bound to an explicit identity that later
 * partitions its state.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { EventEmitter } from 'events';
import { describeError } from '@docsift/async-utils';
import { pathToFileURL } from 'url';
import { PluginHookError, RegistrationError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import { hasErrorCode } from '../utils/ErrnoUtils.js';
import { EXTENSION_POINTS, hasCapabilities, missingCapabilities } from './capabilities.js';
import type {
    CacheProvider,
    CommandRegistrar,
    ConfigurationProvider,
    ContentExtractor,
    ContentFetcher,
    ContentSource,
    DataStorageProvider,
    ExtensionPoint,
    ExtensionPointMap,
    LifecycleAction,
    Registration,
    RegisterOptions,
    RegistryView,
    ResetAction,
    StateStorageProvider,
    TaskExecutionProvider,
} from './types.js';

// =============================================================================
// Module hooks
// =============================================================================

/** Callback handed to a module hook; resolves the same way `register` does */
export type RegisterCallback = (implementation: unknown, options?: { pluginId?: string }) => boolean;

/** Exported function name → extension point it registers */
export const MODULE_HOOKS: Readonly<Record<string, ExtensionPoint>> = {
    registerConfigurationProvider: 'ConfigurationProvider',
    registerCacheProvider: 'CacheProvider',
    registerStateStorageProvider: 'StateStorageProvider',
    registerDataStorageProvider: 'DataStorageProvider',
    registerTaskExecutionProvider: 'TaskExecutionProvider',
    registerContentSource: 'ContentSource',
    registerContentExtractor: 'ContentExtractor',
    registerContentFetcher: 'ContentFetcher',
    registerLifecycleAction: 'LifecycleAction',
    registerResetAction: 'ResetAction',
    registerCommandRegistrar: 'CommandRegistrar',
};

/** Hook that registers an object under every extension point it satisfies */
export const MULTI_CAPABILITY_HOOK = 'registerPlugin';

const MODULE_EXTENSIONS = new Set(['.js', '.mjs', '.ts']);

function isModuleFile(name: string): boolean {
    if (name.endsWith('.d.ts') || /\.(test|spec)\.[mc]?[jt]s$/.test(name)) {
        return false;
    }
    return MODULE_EXTENSIONS.has(path.extname(name));
}

type RegistrationTable = { [P in ExtensionPoint]: Registration<P>[] };

function emptyTable(): RegistrationTable {
    return {
        ConfigurationProvider: [],
        CacheProvider: [],
        StateStorageProvider: [],
        DataStorageProvider: [],
        TaskExecutionProvider: [],
        ContentSource: [],
        ContentExtractor: [],
        ContentFetcher: [],
        LifecycleAction: [],
        ResetAction: [],
        CommandRegistrar: [],
    };
}

export interface RegistrationRejectedEvent {
    extensionPoint: ExtensionPoint | 'any';
    error: RegistrationError;
}

// =============================================================================
// Plugin Registry
// =============================================================================

export class PluginRegistry extends EventEmitter implements RegistryView {
    private readonly registrations: RegistrationTable = emptyTable();
    /** Identity already bound to an implementation object */
    private readonly identities = new WeakMap<object, string>();
    /** Derived identities in use, to keep distinct objects apart */
    private readonly derivedIds = new Set<string>();

    constructor(private readonly logger: Logger = new ConsoleLogger('PluginRegistry')) {
        super();
    }

    // =========================================================================
    // Registration
    // =========================================================================

    /**
     * Register `implementation` under `extensionPoint`.
     * Returns false, and logs a RegistrationError, when a required capability is missing.
     */
    register<P extends ExtensionPoint>(
        extensionPoint: P,
        implementation: unknown,
        options: RegisterOptions = {}
    ): boolean {
        if (!hasCapabilities(extensionPoint, implementation)) {
            this.reject(
                extensionPoint,
                new RegistrationError(
                    extensionPoint,
                    missingCapabilities(extensionPoint, implementation),
                    options.pluginId
                )
            );
            return false;
        }

        const origin = options.origin ?? 'inline';
        const record: Registration<P> = {
            extensionPoint,
            pluginId: this.resolveIdentity(implementation, origin, options.pluginId),
            origin,
            implementation,
        };
        this.registrations[extensionPoint].push(record);
        this.logger.debug(`Registered ${record.pluginId} as ${extensionPoint}`);
        this.emit('registered', record);
        return true;
    }

    /**
     * Register `plugin` under every extension point whose capability set it satisfies.
     */
    registerPlugin(plugin: unknown, options: RegisterOptions = {}): ExtensionPoint[] {
        const points = EXTENSION_POINTS.filter(point => hasCapabilities(point, plugin));
        if (points.length === 0) {
            this.reject('any', new RegistrationError('any extension point', ['a complete capability set'], options.pluginId));
            return [];
        }
        return points.filter(point => this.register(point, plugin, options));
    }

    // =========================================================================
    // Discovery
    // =========================================================================

    /**
     * Import plugin modules from files or directories (non-recursive) and run
     * their registration hooks. Returns the number of accepted registrations.
     */
    async discover(paths: readonly string[]): Promise<number> {
        let accepted = 0;
        for (const modulePath of await this.expandPaths(paths)) {
            let loaded: unknown;
            try {
                loaded = await import(pathToFileURL(modulePath).href);
            } catch (error) {
                this.logger.error(`Failed to import plugin module ${modulePath}:`, error);
                continue;
            }
            accepted += await this.loadModule(loaded, modulePath);
        }
        this.logger.info(`Discovered ${accepted} registrations from ${paths.length} path(s)`);
        return accepted;
    }

    /**
     * Run the registration hooks exported by an already imported module.
     * A throwing hook is logged and the remaining hooks still run.
     */
    async loadModule(module: unknown, origin: string): Promise<number> {
        if ((typeof module !== 'object' && typeof module !== 'function') || module === null) {
            return 0;
        }

        let accepted = 0;
        const hooks: Array<[string, RegisterCallback]> = Object.entries(MODULE_HOOKS).map(([name, point]) => [
            name,
            (implementation, options) => {
                const ok = this.register(point, implementation, { ...options, origin });
                if (ok) accepted++;
                return ok;
            },
        ]);
        hooks.push([
            MULTI_CAPABILITY_HOOK,
            (implementation, options) => {
                const points = this.registerPlugin(implementation, { ...options, origin });
                accepted += points.length;
                return points.length > 0;
            },
        ]);

        for (const [name, callback] of hooks) {
            const hook: unknown = Reflect.get(module, name);
            if (typeof hook !== 'function') {
                continue;
            }
            try {
                const result: unknown = Reflect.apply(hook, module, [callback]);
                await result;
            } catch (error) {
                this.logger.error(new PluginHookError(origin, name, error).message);
            }
        }
        return accepted;
    }

    private async expandPaths(paths: readonly string[]): Promise<string[]> {
        const files: string[] = [];
        for (const entry of paths) {
            const resolved = path.resolve(entry);
            try {
                const stat = await fs.stat(resolved);
                if (!stat.isDirectory()) {
                    files.push(resolved);
                    continue;
                }
                const names = (await fs.readdir(resolved)).filter(isModuleFile).sort();
                files.push(...names.map(name => path.join(resolved, name)));
            } catch (error) {
                if (hasErrorCode(error, 'ENOENT')) {
                    this.logger.warn(`Plugin path ${resolved} does not exist`);
                } else {
                    this.logger.error(`Cannot read plugin path ${resolved}: ${describeError(error)}`);
                }
            }
        }
        return files;
    }

    // =========================================================================
    // Identity
    // =========================================================================

    private resolveIdentity(implementation: object, origin: string, explicit?: string): string {
        if (explicit) {
            return explicit;
        }
        const bound = this.identities.get(implementation);
        if (bound) {
            return bound;
        }

        const own: unknown = Reflect.get(implementation, 'pluginId');
        let identity: string;
        if (typeof own === 'string' && own.length > 0) {
            identity = own;
        } else {
            const base = `${origin}#${implementation.constructor?.name || 'anonymous'}`;
            identity = base;
            for (let n = 2; this.derivedIds.has(identity); n++) {
                identity = `${base}#${n}`;
            }
            this.derivedIds.add(identity);
        }
        this.identities.set(implementation, identity);
        return identity;
    }

    private reject(extensionPoint: ExtensionPoint | 'any', error: RegistrationError): void {
        this.logger.warn(error.message);
        const event: RegistrationRejectedEvent = { extensionPoint, error };
        this.emit('rejected', event);
    }

    // =========================================================================
    // Queries (snapshot copies)
    // =========================================================================

    getRegistrations<P extends ExtensionPoint>(extensionPoint: P): Registration<P>[] {
        return this.registrations[extensionPoint].map(record => ({ ...record }));
    }

    count(extensionPoint?: ExtensionPoint): number {
        if (extensionPoint) {
            return this.registrations[extensionPoint].length;
        }
        return EXTENSION_POINTS.reduce((sum, point) => sum + this.registrations[point].length, 0);
    }

    getConfigurationProviders(): ConfigurationProvider[] {
        return this.implementations('ConfigurationProvider');
    }

    getCacheProviders(): CacheProvider[] {
        return this.implementations('CacheProvider');
    }

    getStateStorageProviders(): StateStorageProvider[] {
        return this.implementations('StateStorageProvider');
    }

    getDataStorageProviders(): DataStorageProvider[] {
        return this.implementations('DataStorageProvider');
    }

    getTaskExecutionProviders(): TaskExecutionProvider[] {
        return this.implementations('TaskExecutionProvider');
    }

    getContentSources(): ContentSource[] {
        return this.implementations('ContentSource');
    }

    getContentExtractors(): ContentExtractor[] {
        return this.implementations('ContentExtractor');
    }

    getContentFetchers(): ContentFetcher[] {
        return this.implementations('ContentFetcher');
    }

    getLifecycleActions(): LifecycleAction[] {
        return this.implementations('LifecycleAction');
    }

    getResetActions(): ResetAction[] {
        return this.implementations('ResetAction');
    }

    getCommandRegistrars(): CommandRegistrar[] {
        return this.implementations('CommandRegistrar');
    }

    private implementations<P extends ExtensionPoint>(extensionPoint: P): Array<ExtensionPointMap[P]> {
        return this.registrations[extensionPoint].map(record => record.implementation);
    }
}
