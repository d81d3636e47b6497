import _ from 'lodash';
import type { ConfigDocument } from './ConfigurationMerge.js';
import { isConfigDocument } from './ConfigurationMerge.js';
import { EMPTY_DIFF, readThrough, touches, type ConfigurationDiff } from './ConfigurationDiff.js';

/**
 * Read-only view over a merged configuration tree and the diff that
 * produced it.
 */
export class Configuration {
    private readonly tree: ConfigDocument;

    constructor(
        tree: ConfigDocument,
        readonly lastDiff: ConfigurationDiff = EMPTY_DIFF
    ) {
        this.tree = _.cloneDeep(tree);
    }

    /**
     * Value at a dotted key (`plugins.directory_watcher.path`), or `defaultValue`
     * when the key is missing.
     */
    get(key: string, defaultValue?: unknown): unknown {
        const value: unknown = _.get(this.tree, key);
        return value === undefined ? defaultValue : _.cloneDeep(value);
    }

    getString(key: string, defaultValue: string): string {
        const value = this.get(key);
        return typeof value === 'string' ? value : defaultValue;
    }

    getNumber(key: string, defaultValue: number): number {
        const value = this.get(key);
        return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
    }

    getBoolean(key: string, defaultValue: boolean): boolean {
        const value = this.get(key);
        return typeof value === 'boolean' ? value : defaultValue;
    }

    getStringArray(key: string, defaultValue: string[]): string[] {
        const value = this.get(key);
        if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
            return value;
        }
        return defaultValue;
    }

    /** Deep copy of a top-level or dotted section; `{}` when missing */
    getSection(name: string): ConfigDocument {
        const value = this.get(name);
        return isConfigDocument(value) ? value : {};
    }

    /** Value added (or the new value of a modified key) by the last build */
    addition(key: string, defaultValue?: unknown): unknown {
        const added = readThrough(this.lastDiff.added, key);
        if (added !== undefined) {
            return added;
        }
        const modified = readThrough(_.mapValues(this.lastDiff.modified, m => m.current), key);
        return modified === undefined ? defaultValue : modified;
    }

    /** Value removed (or the old value of a modified key) by the last build */
    removal(key: string, defaultValue?: unknown): unknown {
        const removed = readThrough(this.lastDiff.removed, key);
        if (removed !== undefined) {
            return removed;
        }
        const modified = readThrough(_.mapValues(this.lastDiff.modified, m => m.previous), key);
        return modified === undefined ? defaultValue : modified;
    }

    hasChanged(key: string): boolean {
        return (
            touches(this.lastDiff.added, key) ||
            touches(this.lastDiff.removed, key) ||
            touches(this.lastDiff.modified, key)
        );
    }

    toJSON(): ConfigDocument {
        return _.cloneDeep(this.tree);
    }
}
