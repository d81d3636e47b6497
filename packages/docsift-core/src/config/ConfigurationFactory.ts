/**
 * Configuration Factory
 *
 * Builds the merged configuration tree from, in precedence order:
 * 1. every ConfigurationProvider default (registration order)
 * 2. user YAML files from the configuration directory (file-name order)
 * 3. the caller-supplied override map
 * and diffs it against the tree of the previous build.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import YAML from 'yaml';
import { ConfigParseError } from '../errors.js';
import { hasErrorCode } from '../utils/ErrnoUtils.js';
import type { Logger } from '../logging/Logger.js';
import type { ConfigurationProvider } from '../plugin-engine/types.js';
import { Configuration } from './Configuration.js';
import { diffConfigurations } from './ConfigurationDiff.js';
import { isConfigDocument, mergeConfiguration, type ConfigDocument } from './ConfigurationMerge.js';
import { substituteEnvVarsInObject } from './EnvSubstitution.js';

export interface ConfigurationBuildOptions {
    /** Highest-precedence overrides */
    userConfig?: ConfigDocument;
    /** Directory holding user *.yaml / *.yml files */
    configDir?: string;
    /** Tree of the previous build; empty on the first one */
    previous?: ConfigDocument | null;
}

const CONFIG_FILE_EXTENSIONS = new Set(['.yaml', '.yml']);

/**
 * Parse one YAML document into a mapping. Empty documents parse to `{}`.
 */
export function parseConfigurationDocument(text: string, source: string): ConfigDocument {
    let parsed: unknown;
    try {
        parsed = YAML.parse(text);
    } catch (error) {
        throw new ConfigParseError('Invalid YAML', source, error);
    }
    if (parsed === null || parsed === undefined) {
        return {};
    }
    const substituted = substituteEnvVarsInObject(parsed);
    if (!isConfigDocument(substituted)) {
        throw new ConfigParseError('Configuration document must be a mapping', source);
    }
    return substituted;
}

/** Name of the user file overriding one provider's defaults */
export function overrideFileName(configurationId: string): string {
    return `${configurationId.replace(/[^\w.-]/g, '_')}.yaml`;
}

/**
 * The values of `merged` at every path `defaults` declares.
 */
export function projectConfiguration(defaults: ConfigDocument, merged: ConfigDocument): ConfigDocument {
    const projected: ConfigDocument = {};
    for (const [key, value] of Object.entries(defaults)) {
        if (!(key in merged)) continue;
        const current = merged[key];
        projected[key] = isConfigDocument(value) && isConfigDocument(current) ? projectConfiguration(value, current) : current;
    }
    return projected;
}

export class ConfigurationFactory {
    constructor(private readonly logger: Logger) {}

    async build(
        providers: readonly ConfigurationProvider[],
        options: ConfigurationBuildOptions = {}
    ): Promise<Configuration> {
        let merged: ConfigDocument = {};

        for (const provider of providers) {
            const defaults = this.readProviderDefaults(provider);
            if (defaults) {
                merged = mergeConfiguration(merged, defaults);
            }
        }

        if (options.configDir) {
            merged = mergeConfiguration(merged, await this.loadConfigDirectory(options.configDir));
        }

        if (options.userConfig) {
            merged = mergeConfiguration(merged, options.userConfig);
        }

        const diff = diffConfigurations(options.previous ?? {}, merged);
        this.logger.debug(
            `Configuration built: ${Object.keys(diff.added).length} added, ` +
                `${Object.keys(diff.modified).length} modified, ${Object.keys(diff.removed).length} removed`
        );
        return new Configuration(merged, diff);
    }

    /**
     * Merge every *.yaml / *.yml file of `dir` in file-name order.
     * A missing directory contributes nothing.
     */
    async loadConfigDirectory(dir: string): Promise<ConfigDocument> {
        let entries: string[];
        try {
            entries = await fs.readdir(dir);
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                this.logger.debug(`Configuration directory ${dir} does not exist`);
                return {};
            }
            throw new ConfigParseError('Cannot read configuration directory', dir, error);
        }

        let merged: ConfigDocument = {};
        for (const name of entries.filter(e => CONFIG_FILE_EXTENSIONS.has(path.extname(e))).sort()) {
            const filePath = path.join(dir, name);
            const text = await fs.readFile(filePath, 'utf8');
            merged = mergeConfiguration(merged, parseConfigurationDocument(text, filePath));
            this.logger.debug(`Loaded configuration file ${filePath}`);
        }
        return merged;
    }

    /** A provider's defaults as a mapping; null (with a warning) when they do not parse */
    readProviderDefaults(provider: ConfigurationProvider): ConfigDocument | null {
        const id = provider.getConfigurationId();
        const defaults = provider.getDefaultConfiguration();
        if (typeof defaults !== 'string') {
            if (isConfigDocument(defaults)) {
                return defaults;
            }
            this.logger.warn(`Skipping configuration from provider '${id}': not a mapping`);
            return null;
        }
        try {
            return parseConfigurationDocument(defaults, `provider:${id}`);
        } catch (error) {
            this.logger.warn(`Skipping configuration from provider '${id}'`, error);
            return null;
        }
    }
}
