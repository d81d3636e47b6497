/**
 * Application
 *
 * Façade over one PluginRegistry and one StartupManager. Entry points, command
 * handlers and workers talk to this class; each worker builds its own
 * instance through `createWorkerContext`.
 */

import { describeError } from '@docsift/async-utils';
import type { ConfigDocument } from '../config/ConfigurationMerge.js';
import { ResourceUnavailableError, StartupError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import { HostFactory } from '../plugin-engine/hosts.js';
import { PluginRegistry } from '../plugin-engine/PluginRegistry.js';
import type { CommandDefinition, CommandTable, Singletons } from '../plugin-engine/types.js';
import { getProfile } from '../profiles/index.js';
import type { WorkerContextDescriptor } from '../tasks/types.js';
import { StartupManager, type StartupState } from './StartupManager.js';

export interface ApplicationOptions {
    logger?: Logger;
    /** Directory of user YAML configuration files */
    configDir?: string;
}

/** An already imported plugin module and the name it is registered under */
export interface PluginModule {
    origin: string;
    module: unknown;
}

export interface BootstrapOptions {
    /** Profile whose plugins are registered first */
    profile?: string;
    /** Extra imported modules, loaded after the profile */
    modules?: readonly PluginModule[];
    /** Module files or directories to discover last */
    paths?: readonly string[];
}

export interface ResetOutcome {
    pluginId: string;
    status: 'ok' | 'failed';
    error?: string;
}

export interface WorkerContext {
    workerId: string;
    application: Application;
    singletons: Singletons;
}

export class Application {
    readonly registry: PluginRegistry;
    readonly manager: StartupManager;
    private readonly logger: Logger;
    private readonly configDir?: string;
    private bootstrapOptions: BootstrapOptions | null = null;
    private bootstrapping: Promise<void> | null = null;
    private userConfig: ConfigDocument = {};

    constructor(options: ApplicationOptions = {}) {
        this.logger = options.logger ?? new ConsoleLogger('docsift');
        this.configDir = options.configDir;
        this.registry = new PluginRegistry(this.logger.child('PluginRegistry'));
        this.manager = new StartupManager({ logger: this.logger, configDir: this.configDir });
    }

    // =========================================================================
    // Lifecycle
    // =========================================================================

    /**
     * Register the profile's plugins, then the extra modules, then whatever
     * the paths yield. Only the first call does anything.
     */
    bootstrap(options: BootstrapOptions = {}): Promise<void> {
        if (!this.bootstrapping) {
            this.bootstrapping = this.performBootstrap(options);
        }
        return this.bootstrapping;
    }

    private async performBootstrap(options: BootstrapOptions): Promise<void> {
        if (options.profile) {
            const profile = getProfile(options.profile);
            if (!profile) {
                throw new StartupError(`Unknown profile '${options.profile}'`);
            }
            await this.registry.loadModule(profile, `profile:${options.profile}`);
        }
        for (const { origin, module } of options.modules ?? []) {
            await this.registry.loadModule(module, origin);
        }
        if (options.paths && options.paths.length > 0) {
            await this.registry.discover(options.paths);
        }

        this.bootstrapOptions = options;
        this.manager.bootstrap(this.registry);
        this.logger.info(
            `Bootstrapped${options.profile ? ` profile '${options.profile}'` : ''} with ${this.registry.count()} registration(s)`
        );
    }

    start(userConfig: ConfigDocument = {}): Promise<Singletons> {
        this.userConfig = userConfig;
        return this.manager.executeStartup(userConfig);
    }

    startToSingletons(userConfig: ConfigDocument = {}): Promise<Singletons> {
        this.userConfig = userConfig;
        return this.manager.startToSingletons(userConfig);
    }

    stop(): Promise<void> {
        return this.manager.stop();
    }

    isRunning(): boolean {
        return this.manager.getState() === 'RUNNING';
    }

    getState(): StartupState {
        return this.manager.getState();
    }

    getConfigDir(): string | undefined {
        return this.configDir;
    }

    getSingletons(): Singletons {
        const singletons = this.manager.getSingletons();
        if (!singletons) {
            throw new ResourceUnavailableError('singletons', 'Application has not been started');
        }
        return singletons;
    }

    // =========================================================================
    // Reset
    // =========================================================================

    /**
     * Run every ResetAction one after another. A failing action is recorded
     * and the rest still run.
     */
    async reset(hard: boolean): Promise<ResetOutcome[]> {
        const singletons = this.getSingletons();
        const hosts = new HostFactory(singletons);
        const outcomes: ResetOutcome[] = [];

        for (const { pluginId, implementation } of this.registry.getRegistrations('ResetAction')) {
            const host = hosts.createLifecycleHost(pluginId);
            try {
                if (hard) {
                    await implementation.hardReset(host, singletons.configuration);
                } else {
                    await implementation.softReset(host, singletons.configuration);
                }
                outcomes.push({ pluginId, status: 'ok' });
            } catch (error) {
                this.logger.error(`${hard ? 'Hard' : 'Soft'} reset failed in ${pluginId}: ${describeError(error)}`);
                outcomes.push({ pluginId, status: 'failed', error: describeError(error) });
            }
        }

        this.logger.info(`${hard ? 'Hard' : 'Soft'} reset ran ${outcomes.length} action(s)`);
        return outcomes;
    }

    // =========================================================================
    // Commands
    // =========================================================================

    /**
     * Command table built from every CommandRegistrar. On a name clash the
     * first registration wins.
     */
    getCommands(): Map<string, CommandDefinition> {
        const commands = new Map<string, CommandDefinition>();
        const table: CommandTable = {
            add: command => {
                if (commands.has(command.name)) {
                    this.logger.warn(`Command '${command.name}' is already registered, ignoring duplicate`);
                    return;
                }
                commands.set(command.name, command);
            },
        };
        for (const { pluginId, implementation } of this.registry.getRegistrations('CommandRegistrar')) {
            try {
                implementation.registerCommands(table);
            } catch (error) {
                this.logger.error(`Command registrar ${pluginId} failed: ${describeError(error)}`);
            }
        }
        return commands;
    }

    // =========================================================================
    // Workers
    // =========================================================================

    /**
     * Recipe another thread or process needs to rebuild this application.
     * Only the profile, user configuration and module paths travel; imported
     * modules do not.
     */
    describe(): WorkerContextDescriptor {
        const options = this.bootstrapOptions;
        if (!options?.profile) {
            throw new ResourceUnavailableError('profile', 'Application was not bootstrapped from a profile');
        }
        return {
            profile: options.profile,
            userConfig: this.userConfig,
            ...(options.paths && options.paths.length > 0 ? { paths: [...options.paths] } : {}),
        };
    }

    /**
     * Build an independent Application for a worker, bootstrapped the same
     * way as this one and started up to its singletons.
     */
    async createWorkerContext(workerId: string): Promise<WorkerContext> {
        const options = this.bootstrapOptions;
        if (!options) {
            throw new ResourceUnavailableError('registry', 'Application has not been bootstrapped');
        }
        return createWorkerContext({
            workerId,
            profile: options.profile,
            modules: options.modules,
            paths: options.paths,
            userConfig: this.userConfig,
            configDir: this.configDir,
            logger: this.logger,
        });
    }
}

export interface WorkerContextOptions extends BootstrapOptions {
    workerId: string;
    userConfig?: ConfigDocument;
    configDir?: string;
    logger?: Logger;
}

/**
 * Fresh registry, fresh singletons. Nothing is shared with the caller.
 */
export async function createWorkerContext(options: WorkerContextOptions): Promise<WorkerContext> {
    const logger = (options.logger ?? new ConsoleLogger('docsift')).child(`worker:${options.workerId}`);
    const application = new Application({ logger, configDir: options.configDir });
    await application.bootstrap({ profile: options.profile, modules: options.modules, paths: options.paths });
    const singletons = await application.startToSingletons(options.userConfig ?? {});
    return { workerId: options.workerId, application, singletons };
}
