import dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';
import { parseLogLevel, type LogLevel } from '../logging/Logger.js';

dotenv.config();

interface EnvConfig {
    /** Deployment profile: test, development or production (default 'development') */
    DOCSIFT_PROFILE: string;

    /** Directory of user *.yaml / *.yml configuration files merged over plugin defaults (default ~/.config/docsift) */
    DOCSIFT_CONFIG_DIR: string;

    /** Base directory for file-backed state and cache (default ~/.local/share/docsift) */
    DOCSIFT_DATA_DIR: string;

    /** Extra plugin module files or directories, separated by the platform path delimiter (optional) */
    DOCSIFT_PLUGIN_PATHS: string[];

    /** Minimum level printed by the console logger (default 'info') */
    LOG_LEVEL: LogLevel;

    // ========================================================================
    // Redis (production profile)
    // ========================================================================

    /** Redis connection URL (default 'redis://localhost:6379') */
    REDIS_URL: string;

    /** Prefix prepended to every Redis key (default 'docsift:') */
    REDIS_PREFIX: string;

    // ========================================================================
    // Task workers
    // ========================================================================

    /** Worker threads in the piscina pool (default: CPU count) */
    WORKER_THREADS: number;

    /** Tasks a single worker runs at once (default 4) */
    WORKER_CONCURRENCY: number;

    /** Delay between polls of an empty queue (default 1000) */
    WORKER_POLL_INTERVAL_MS: number;

    /** Attempts before a task is dead-lettered (default 3) */
    TASK_MAX_ATTEMPTS: number;
}

function parseList(value: string | undefined): string[] {
    return (value ?? '').split(path.delimiter).map(entry => entry.trim()).filter(Boolean);
}

function parseInteger(value: string | undefined, fallback: number): number {
    if (value === undefined || value === '') {
        return fallback;
    }
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export const config: EnvConfig = {
    DOCSIFT_PROFILE: process.env.DOCSIFT_PROFILE || 'development',
    DOCSIFT_CONFIG_DIR: process.env.DOCSIFT_CONFIG_DIR || path.join(os.homedir(), '.config', 'docsift'),
    DOCSIFT_DATA_DIR: process.env.DOCSIFT_DATA_DIR || path.join(os.homedir(), '.local', 'share', 'docsift'),
    DOCSIFT_PLUGIN_PATHS: parseList(process.env.DOCSIFT_PLUGIN_PATHS),
    LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),

    REDIS_URL: process.env.REDIS_URL || 'redis://localhost:6379',
    REDIS_PREFIX: process.env.REDIS_PREFIX ?? 'docsift:',

    WORKER_THREADS: parseInteger(process.env.WORKER_THREADS, os.cpus().length),
    WORKER_CONCURRENCY: parseInteger(process.env.WORKER_CONCURRENCY, 4),
    WORKER_POLL_INTERVAL_MS: parseInteger(process.env.WORKER_POLL_INTERVAL_MS, 1000),
    TASK_MAX_ATTEMPTS: parseInteger(process.env.TASK_MAX_ATTEMPTS, 3),
};

export type { EnvConfig };
