/**
 * Core Commands
 *
 * run       start everything and keep running until shutdown
 * worker    drain the durable task queue (--once, --threads)
 * reset     run every ResetAction (--hard)
 * status    registrations, backends, queue depth and health (--json)
 * validate  build every singleton and check that each one answers
 * version   print name and version
 * config    print, list, show or reset configuration
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import YAML from 'yaml';
import { describeError } from '@docsift/async-utils';
import { config } from '../../config/EnvConfig.js';
import type { ConfigDocument } from '../../config/ConfigurationMerge.js';
import { ConfigurationFactory, overrideFileName, projectConfiguration } from '../../config/ConfigurationFactory.js';
import { formatHealthReport, SystemHealthMonitor } from '../../monitoring/HealthMonitor.js';
import { EXTENSION_POINTS } from '../../plugin-engine/capabilities.js';
import type { CommandContext, CommandDefinition, CommandRegistrar, CommandTable } from '../../plugin-engine/types.js';
import { DurableTaskQueue } from '../../tasks/DurableTaskQueue.js';
import { PipelineTaskExecutor } from '../../tasks/PipelineTaskExecutor.js';
import { InProcessTaskRunner, TaskWorker, type TaskRunner } from '../../tasks/TaskWorker.js';
import { ThreadPoolTaskRunner } from '../../tasks/ThreadPoolTaskRunner.js';
import { hasErrorCode } from '../../utils/ErrnoUtils.js';
import { NAME, VERSION } from '../../version.js';

function untilAborted(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return Promise.resolve();
    return new Promise(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
}

const runCommand: CommandDefinition = {
    name: 'run',
    description: 'Start the application and run until interrupted',
    async run({ application, logger, signal }: CommandContext): Promise<number> {
        await application.start();
        logger.info('Running, press Ctrl+C to stop');
        await untilAborted(signal);
        await application.stop();
        return 0;
    },
};

const workerCommand: CommandDefinition = {
    name: 'worker',
    description: 'Process the durable task queue (--once to drain and exit, --threads for a thread pool)',
    async run({ application, args, logger, signal }: CommandContext): Promise<number> {
        const context = await application.createWorkerContext(`worker-${process.pid}`);
        const queue = context.singletons.taskQueue;
        if (!(queue instanceof DurableTaskQueue)) {
            logger.error('The worker needs a durable task queue (providers.task_execution: durable)');
            await context.application.stop();
            return 1;
        }

        const runner: TaskRunner = args.includes('--threads')
            ? new ThreadPoolTaskRunner(application.describe(), {
                  maxThreads: config.WORKER_THREADS,
                  logger: context.singletons.logger.child('ThreadPool'),
              })
            : new InProcessTaskRunner(new PipelineTaskExecutor(context.singletons));
        const worker = new TaskWorker(queue.store, runner, context.singletons.logger.child('TaskWorker'), {
            concurrency: config.WORKER_CONCURRENCY,
            pollIntervalMs: config.WORKER_POLL_INTERVAL_MS,
            maxAttempts: config.TASK_MAX_ATTEMPTS,
        });

        try {
            if (args.includes('--once')) {
                // Units scheduled by the units being run are drained as well
                let processed = 0;
                for (let batch = await worker.drain(); batch > 0; batch = await worker.drain()) {
                    processed += batch;
                }
                await runner.close();
                logger.info(`Processed ${processed} task(s)`);
            } else {
                worker.start();
                await untilAborted(signal);
                await worker.stop();
            }
        } finally {
            await context.application.stop();
        }
        return 0;
    },
};

const resetCommand: CommandDefinition = {
    name: 'reset',
    description: 'Reset caches and queues (--hard also clears stored data and state)',
    async run({ application, args, print }: CommandContext): Promise<number> {
        const hard = args.includes('--hard');
        await application.startToSingletons();
        try {
            const outcomes = await application.reset(hard);
            for (const outcome of outcomes) {
                print(`${outcome.pluginId}: ${outcome.status}${outcome.error ? ` (${outcome.error})` : ''}`);
            }
            return outcomes.some(outcome => outcome.status === 'failed') ? 1 : 0;
        } finally {
            await application.stop();
        }
    },
};

const statusCommand: CommandDefinition = {
    name: 'status',
    description: 'Show registrations, selected backends, queue depth and health (--json)',
    async run({ application, args, print, logger }: CommandContext): Promise<number> {
        const singletons = await application.startToSingletons();
        try {
            const registrations = Object.fromEntries(
                EXTENSION_POINTS.map(point => [point, application.registry.count(point)])
            );
            const queue = singletons.taskQueue;
            const health = await new SystemHealthMonitor(logger.child('Health')).checkSystemHealth(singletons);
            const status = {
                state: application.getState(),
                registrations,
                taskExecution: queue ? queue.mode : 'synchronous',
                queue: queue instanceof DurableTaskQueue ? await queue.store.stats() : null,
                health,
            };

            if (args.includes('--json')) {
                print(JSON.stringify(status, null, 2));
                return 0;
            }
            print(`State: ${status.state}`);
            print(`Task execution: ${status.taskExecution}`);
            if (status.queue) {
                print(
                    `Queue: ${status.queue.pending} pending, ${status.queue.processing} processing, ${status.queue.failed} failed`
                );
            }
            for (const [point, count] of Object.entries(registrations)) {
                print(`${point}: ${count}`);
            }
            print(formatHealthReport(health));
            return 0;
        } finally {
            await application.stop();
        }
    },
};

const validateCommand: CommandDefinition = {
    name: 'validate',
    description: 'Build every backend from the configuration and check that each one answers',
    async run({ application, print, logger }: CommandContext): Promise<number> {
        try {
            const singletons = await application.startToSingletons();
            const report = await new SystemHealthMonitor(logger.child('Health')).checkSystemHealth(singletons);
            let failed = 0;
            for (const [name, component] of Object.entries(report.components)) {
                if (component.status === 'unhealthy') {
                    failed++;
                    print(`✗ ${name}: ${component.details.error ?? 'unhealthy'}`);
                } else {
                    print(`✓ ${name}`);
                }
            }
            if (failed > 0) {
                logger.error(`Validation failed: ${failed} component(s) unhealthy`);
                return 1;
            }
            print('All validation checks passed!');
            return 0;
        } catch (error) {
            logger.error(`Validation failed: ${describeError(error)}`);
            return 1;
        } finally {
            await application.stop();
        }
    },
};

const versionCommand: CommandDefinition = {
    name: 'version',
    description: 'Print the version',
    async run({ print }: CommandContext): Promise<number> {
        print(`${NAME} ${VERSION}`);
        return 0;
    },
};

// =============================================================================
// config
// =============================================================================

type ConfigAction = (context: CommandContext, args: string[]) => Promise<number>;

interface ConfigurationEntry {
    id: string;
    plugin: string;
    hasOverride: boolean;
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) return false;
        throw error;
    }
}

async function listConfigurations({ application }: CommandContext): Promise<ConfigurationEntry[]> {
    const configDir = application.getConfigDir();
    const entries: ConfigurationEntry[] = [];
    for (const { pluginId, implementation } of application.registry.getRegistrations('ConfigurationProvider')) {
        const id = implementation.getConfigurationId();
        const hasOverride = configDir ? await fileExists(path.join(configDir, overrideFileName(id))) : false;
        entries.push({ id, plugin: pluginId, hasOverride });
    }
    return entries;
}

/** Logs every requested id no provider declares; true when there was one */
function unknownIds(requested: readonly string[], available: readonly string[], context: CommandContext): boolean {
    const missing = requested.filter(id => !available.includes(id));
    for (const id of missing) {
        context.logger.error(`Configuration ID '${id}' not found. Available IDs: ${available.join(', ')}`);
    }
    return missing.length > 0;
}

function printDocument(print: (line: string) => void, value: unknown, json: boolean): void {
    if (json) {
        print(JSON.stringify(value, null, 2));
    } else if (typeof value === 'object' && value !== null) {
        print(YAML.stringify(value).trimEnd());
    } else {
        print(String(value));
    }
}

const configList: ConfigAction = async (context, args) => {
    const entries = await listConfigurations(context);
    if (args.includes('--json')) {
        context.print(JSON.stringify({ configurations: entries }, null, 2));
        return 0;
    }
    for (const { id, hasOverride } of entries) {
        context.print(hasOverride ? `${id} (overridden)` : id);
    }
    return 0;
};

const configShow: ConfigAction = async (context, args) => {
    const { application, logger } = context;
    const ids = args.filter(arg => !arg.startsWith('--'));
    const providers = application.registry.getConfigurationProviders();
    const available = providers.map(provider => provider.getConfigurationId());
    if (unknownIds(ids, available, context)) {
        return 1;
    }

    const { configuration } = await application.startToSingletons();
    const merged = configuration.toJSON();
    const factory = new ConfigurationFactory(logger);
    const shown: ConfigDocument = {};
    for (const provider of providers) {
        const id = provider.getConfigurationId();
        if (ids.length > 0 && !ids.includes(id)) continue;
        shown[id] = projectConfiguration(factory.readProviderDefaults(provider) ?? {}, merged);
    }
    printDocument(context.print, shown, args.includes('--json'));
    return 0;
};

const configReset: ConfigAction = async (context, args) => {
    const { application, logger, print } = context;
    const all = args.includes('--all');
    const ids = args.filter(arg => !arg.startsWith('--'));
    if (all === (ids.length > 0) || ids.length > 1) {
        logger.error('Give exactly one configuration id, or --all');
        return 1;
    }
    const configDir = application.getConfigDir();
    if (!configDir) {
        logger.error('No configuration directory is set (DOCSIFT_CONFIG_DIR)');
        return 1;
    }

    if (!all) {
        const [id] = ids;
        const available = application.registry.getConfigurationProviders().map(p => p.getConfigurationId());
        if (unknownIds(ids, available, context)) {
            return 1;
        }
        try {
            await fs.unlink(path.join(configDir, overrideFileName(id)));
            print(`Reset configuration for '${id}'`);
        } catch (error) {
            if (!hasErrorCode(error, 'ENOENT')) throw error;
            print(`No override file found for '${id}' (already at default)`);
        }
        return 0;
    }

    let names: string[];
    try {
        names = (await fs.readdir(configDir)).filter(name => ['.yaml', '.yml'].includes(path.extname(name))).sort();
    } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) throw error;
        names = [];
    }
    if (names.length === 0) {
        print('No configuration override files found.');
        return 0;
    }
    for (const name of names) {
        await fs.unlink(path.join(configDir, name));
        print(`Deleted: ${name}`);
    }
    print(`Reset all configuration overrides (${names.length} files)`);
    return 0;
};

const configGet: ConfigAction = async (context, args) => {
    const { configuration } = await context.application.startToSingletons();
    const key = args.find(arg => !arg.startsWith('--'));
    if (!key) {
        printDocument(context.print, configuration.toJSON(), args.includes('--json'));
        return 0;
    }
    const value = configuration.get(key);
    if (value === undefined) {
        context.logger.error(`No configuration value at '${key}'`);
        return 1;
    }
    printDocument(context.print, value, args.includes('--json'));
    return 0;
};

const CONFIG_ACTIONS = new Map<string, ConfigAction>([
    ['list', configList],
    ['show', configShow],
    ['reset', configReset],
    ['get', configGet],
]);

const configCommand: CommandDefinition = {
    name: 'config',
    description: 'Print the merged configuration or one key of it; list, show <id...> or reset <id>|--all overrides',
    async run(context: CommandContext): Promise<number> {
        const [first, ...rest] = context.args;
        const action = first !== undefined ? CONFIG_ACTIONS.get(first) : undefined;
        try {
            // Anything that is not a subcommand is a dotted key
            return action ? await action(context, rest) : await configGet(context, context.args);
        } catch (error) {
            context.logger.error(`Could not read configuration: ${describeError(error)}`);
            return 1;
        } finally {
            await context.application.stop();
        }
    },
};

export class CoreCommands implements CommandRegistrar {
    readonly pluginId = 'core_commands';

    registerCommands(commands: CommandTable): void {
        for (const command of [
            runCommand,
            workerCommand,
            resetCommand,
            statusCommand,
            validateCommand,
            versionCommand,
            configCommand,
        ]) {
            commands.add(command);
        }
    }
}
