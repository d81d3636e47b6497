/**
 * Startup Manager
 *
 * Lifecycle state machine:
 *
 *   UNINITIALIZED → BOOTSTRAPPED → CONFIGURED → SINGLETONS_READY → RUNNING
 *                                                      │              │
 *                                                      └──→ STOPPED ←─┘ → UNINITIALIZED
 *
 * Configuration and singleton failures roll back to UNINITIALIZED; the
 * registry stays bound so the startup can be retried.
 */

import { EventEmitter } from 'events';
import { describeError, fanOut } from '@docsift/async-utils';
import type { ConfigDocument } from '../config/ConfigurationMerge.js';
import { ConfigurationFactory } from '../config/ConfigurationFactory.js';
import { PluginHookError, StartupError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import { HostFactory } from '../plugin-engine/hosts.js';
import type { RegistryView, Singletons } from '../plugin-engine/types.js';
import { closeSingletons, createSingletons } from './SingletonFactory.js';

export type StartupState =
    | 'UNINITIALIZED'
    | 'BOOTSTRAPPED'
    | 'CONFIGURED'
    | 'SINGLETONS_READY'
    | 'RUNNING'
    | 'STOPPED';

export interface StateChangeEvent {
    from: StartupState;
    to: StartupState;
}

export interface StartupManagerOptions {
    logger?: Logger;
    /** Directory of user YAML files folded over the provider defaults */
    configDir?: string;
}

export class StartupManager extends EventEmitter {
    private state: StartupState = 'UNINITIALIZED';
    private registry: RegistryView | null = null;
    private singletons: Singletons | null = null;
    private inFlight: Promise<Singletons> | null = null;
    private stopping: Promise<void> | null = null;
    /** Tree of the last successful configuration build */
    private lastConfigurationTree: ConfigDocument | null = null;

    private readonly logger: Logger;
    private readonly configDir?: string;
    private readonly configurationFactory: ConfigurationFactory;

    constructor(options: StartupManagerOptions = {}) {
        super();
        this.logger = options.logger ?? new ConsoleLogger('docsift');
        this.configDir = options.configDir;
        this.configurationFactory = new ConfigurationFactory(this.logger.child('Configuration'));
    }

    getState(): StartupState {
        return this.state;
    }

    getSingletons(): Singletons | null {
        return this.singletons;
    }

    getRegistry(): RegistryView | null {
        return this.registry;
    }

    // =========================================================================
    // Bootstrap
    // =========================================================================

    /**
     * Bind the registry. A second call is a no-op.
     */
    bootstrap(registry: RegistryView): void {
        if (this.registry) {
            this.logger.debug('Already bootstrapped');
            return;
        }
        this.registry = registry;
        this.transition('BOOTSTRAPPED');
    }

    // =========================================================================
    // Startup
    // =========================================================================

    /**
     * Build configuration and singletons, then start every LifecycleAction.
     * While RUNNING this returns the current singletons; concurrent calls
     * share one startup.
     */
    executeStartup(userConfig: ConfigDocument = {}): Promise<Singletons> {
        return this.startup(userConfig, true);
    }

    /**
     * Build configuration and singletons only, stopping at SINGLETONS_READY.
     */
    startToSingletons(userConfig: ConfigDocument = {}): Promise<Singletons> {
        return this.startup(userConfig, false);
    }

    private startup(userConfig: ConfigDocument, full: boolean): Promise<Singletons> {
        // A start requested during shutdown runs once the shutdown is over
        if (this.stopping) {
            return this.stopping.then(() => this.startup(userConfig, full));
        }
        if (this.inFlight) {
            return this.inFlight;
        }
        const current = this.singletons;
        if (current && (this.state === 'RUNNING' || (this.state === 'SINGLETONS_READY' && !full))) {
            return Promise.resolve(current);
        }

        this.inFlight = (current ? this.startLifecycle(current) : this.performStartup(userConfig, full)).finally(
            () => {
                this.inFlight = null;
            }
        );
        return this.inFlight;
    }

    private async performStartup(userConfig: ConfigDocument, full: boolean): Promise<Singletons> {
        const registry = this.registry;
        if (!registry) {
            throw new StartupError('Cannot start before bootstrap: no registry bound');
        }
        let singletons: Singletons;
        try {
            const configuration = await this.configurationFactory.build(registry.getConfigurationProviders(), {
                userConfig,
                configDir: this.configDir,
                previous: this.lastConfigurationTree,
            });
            this.transition('CONFIGURED');

            singletons = await createSingletons(registry, configuration, this.logger);
            this.singletons = singletons;
            this.lastConfigurationTree = configuration.toJSON();
            this.transition('SINGLETONS_READY');
        } catch (error) {
            this.singletons = null;
            this.transition('UNINITIALIZED');
            this.logger.error(`Startup failed: ${describeError(error)}`);
            if (error instanceof StartupError) {
                throw error;
            }
            throw new StartupError(`Startup failed: ${describeError(error)}`, { cause: error });
        }

        return full ? this.startLifecycle(singletons) : singletons;
    }

    /**
     * Call onStart on every LifecycleAction concurrently. A failing action is
     * logged and does not fail the startup.
     */
    private async startLifecycle(singletons: Singletons): Promise<Singletons> {
        const actions = singletons.registry.getRegistrations('LifecycleAction');
        const hosts = new HostFactory(singletons);

        const report = await fanOut(actions, action =>
            action.implementation.onStart(hosts.createLifecycleHost(action.pluginId))
        );
        for (const { key, error } of report.rejected) {
            this.hookFailed(new PluginHookError(key.pluginId, 'onStart', error));
        }

        this.transition('RUNNING');
        this.logger.info(`Started ${report.fulfilled.length}/${actions.length} lifecycle action(s)`);
        return singletons;
    }

    // =========================================================================
    // Shutdown
    // =========================================================================

    /**
     * Stop every LifecycleAction in reverse registration order, including
     * those whose onStart failed, release the backends and return to
     * UNINITIALIZED. Safe to call repeatedly.
     */
    stop(): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.performStop().finally(() => {
                this.stopping = null;
            });
        }
        return this.stopping;
    }

    private async performStop(): Promise<void> {
        if (this.inFlight) {
            await Promise.allSettled([this.inFlight]);
        }
        if (this.state === 'UNINITIALIZED') {
            return;
        }
        const singletons = this.singletons;
        if (!singletons) {
            this.transition('STOPPED');
            this.transition('UNINITIALIZED');
            return;
        }

        if (this.state === 'RUNNING') {
            const hosts = new HostFactory(singletons);
            const actions = singletons.registry.getRegistrations('LifecycleAction').reverse();
            const report = await fanOut(actions, action =>
                action.implementation.onStop(hosts.createLifecycleHost(action.pluginId))
            );
            for (const { key, error } of report.rejected) {
                this.hookFailed(new PluginHookError(key.pluginId, 'onStop', error));
            }
        }
        this.transition('STOPPED');

        await closeSingletons(singletons, this.logger);
        this.singletons = null;
        this.transition('UNINITIALIZED');
    }

    // =========================================================================
    // Helpers
    // =========================================================================

    private hookFailed(error: PluginHookError): void {
        this.logger.error(error.message);
        this.emit('hook:failed', error);
    }

    private transition(to: StartupState): void {
        const from = this.state;
        this.state = to;
        this.logger.debug(`State ${from} → ${to}`);
        const event: StateChangeEvent = { from, to };
        this.emit('state', event);
    }
}
