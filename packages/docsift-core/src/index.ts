/**
 * @docsift/core
 *
 * Plugin-driven content indexing engine: registry, configuration, startup
 * state machine, storage backends, task queues and the built-in plugins.
 */

export * from './errors.js';
export * from './config/index.js';
export * from './kv/index.js';
export * from './storage/index.js';
export * from './tasks/index.js';
export * from './plugin-engine/index.js';
export { ConsoleLogger, MemoryLogger, parseLogLevel } from './logging/Logger.js';
export type { Logger, LogLevel, LogEntry } from './logging/Logger.js';
export { StartupManager } from './startup/StartupManager.js';
export type { StartupManagerOptions, StartupState, StateChangeEvent } from './startup/StartupManager.js';
export { Application, createWorkerContext } from './startup/Application.js';
export type {
    ApplicationOptions,
    BootstrapOptions,
    PluginModule,
    ResetOutcome,
    WorkerContext,
    WorkerContextOptions,
} from './startup/Application.js';
export { runCli } from './cli.js';
export type { CliOptions } from './cli.js';
export { PROFILE_NAMES, getProfile } from './profiles/index.js';
