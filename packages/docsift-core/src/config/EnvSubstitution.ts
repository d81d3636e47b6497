/**
 * Environment variable substitution for YAML configuration values.
 * Supports: ${VAR}, ${VAR:-default}, ${VAR:=default}
 */

const ENV_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?:(:?[-=])([^}]*))?\}/gi;

export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
    return value.replace(ENV_PATTERN, (_match, varName: string, operator: string | undefined, defaultValue: string | undefined) => {
        const envValue = env[varName];
        if (envValue !== undefined && envValue !== '') {
            return envValue;
        }
        if (operator === ':-' || operator === ':=' || operator === '-' || operator === '=') {
            return defaultValue ?? '';
        }
        return '';
    });
}

/**
 * Recursively substitute env vars in every string of a parsed document.
 */
export function substituteEnvVarsInObject(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof value === 'string') {
        return substituteEnvVars(value, env);
    }
    if (Array.isArray(value)) {
        return value.map(item => substituteEnvVarsInObject(item, env));
    }
    if (value !== null && typeof value === 'object') {
        const result: Record<string, unknown> = {};
        for (const [key, child] of Object.entries(value)) {
            result[key] = substituteEnvVarsInObject(child, env);
        }
        return result;
    }
    return value;
}
