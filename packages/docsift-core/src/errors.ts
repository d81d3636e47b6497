/**
 * Error taxonomy for the plugin engine.
 *
 * Only StartupError and ConfigParseError ever abort a run. The others are
 * created at a failure boundary, logged there, and execution continues.
 */

/**
 * A plugin object does not expose the capability set of an extension point.
 */
export class RegistrationError extends Error {
    constructor(
        public readonly extensionPoint: string,
        public readonly missing: readonly string[],
        public readonly pluginId?: string
    ) {
        super(
            `Cannot register ${pluginId ?? 'plugin'} as ${extensionPoint}: missing ${missing.join(', ')}`
        );
        this.name = 'RegistrationError';
    }
}

/**
 * Configuration or singleton construction failed; the startup is rolled back.
 */
export class StartupError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StartupError';
    }
}

/**
 * A plugin hook raised inside a fan-out batch.
 */
export class PluginHookError extends Error {
    constructor(
        public readonly pluginId: string,
        public readonly hook: string,
        cause: unknown
    ) {
        super(`Plugin '${pluginId}' failed in ${hook}: ${cause instanceof Error ? cause.message : String(cause)}`, {
            cause,
        });
        this.name = 'PluginHookError';
    }
}

/**
 * A collaborator needed by a phase is not configured (e.g. no task queue).
 */
export class ResourceUnavailableError extends Error {
    constructor(
        public readonly resource: string,
        message: string
    ) {
        super(message);
        this.name = 'ResourceUnavailableError';
    }
}

/**
 * A YAML configuration document could not be read or parsed.
 */
export class ConfigParseError extends Error {
    constructor(
        message: string,
        public readonly filePath: string,
        cause?: unknown
    ) {
        super(`${message} (file: ${filePath})`, { cause });
        this.name = 'ConfigParseError';
    }
}

/**
 * A queued task cannot be decoded or names an unknown task.
 */
export class TaskExecutionError extends Error {
    constructor(
        message: string,
        public readonly taskId?: string
    ) {
        super(message);
        this.name = 'TaskExecutionError';
    }
}
