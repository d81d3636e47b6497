/**
 * Logging
 *
 * Console-backed loggers with `[scope]` prefixes, plus an in-memory logger
 * used by tests and by code that needs to inspect what was logged.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    /** Derive a logger whose prefix is `scope` */
    child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
    switch (value?.toLowerCase()) {
        case 'debug':
            return 'debug';
        case 'info':
            return 'info';
        case 'warn':
        case 'warning':
            return 'warn';
        case 'error':
            return 'error';
        default:
            return fallback;
    }
}

// =============================================================================
// Console Logger
// =============================================================================

export class ConsoleLogger implements Logger {
    private readonly prefix: string;

    constructor(
        private readonly scope: string = 'docsift',
        private readonly level: LogLevel = 'info'
    ) {
        this.prefix = `[${scope}]`;
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.enabled('debug')) console.debug(this.prefix, message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        if (this.enabled('info')) console.info(this.prefix, message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.enabled('warn')) console.warn(this.prefix, message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        if (this.enabled('error')) console.error(this.prefix, message, ...args);
    }

    child(scope: string): Logger {
        return new ConsoleLogger(scope, this.level);
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }
}

// =============================================================================
// Memory Logger
// =============================================================================

export interface LogEntry {
    level: LogLevel;
    scope: string;
    message: string;
    args: unknown[];
}

/**
 * Records entries instead of printing them. Children share the parent's
 * entry list so one instance sees everything logged below it.
 */
export class MemoryLogger implements Logger {
    constructor(
        readonly scope: string = 'docsift',
        readonly entries: LogEntry[] = []
    ) {}

    debug(message: string, ...args: unknown[]): void {
        this.entries.push({ level: 'debug', scope: this.scope, message, args });
    }

    info(message: string, ...args: unknown[]): void {
        this.entries.push({ level: 'info', scope: this.scope, message, args });
    }

    warn(message: string, ...args: unknown[]): void {
        this.entries.push({ level: 'warn', scope: this.scope, message, args });
    }

    error(message: string, ...args: unknown[]): void {
        this.entries.push({ level: 'error', scope: this.scope, message, args });
    }

    child(scope: string): Logger {
        return new MemoryLogger(scope, this.entries);
    }

    /** Messages at `level`, or all of them */
    messages(level?: LogLevel): string[] {
        return this.entries.filter(e => level === undefined || e.level === level).map(e => e.message);
    }

    clear(): void {
        this.entries.length = 0;
    }
}
