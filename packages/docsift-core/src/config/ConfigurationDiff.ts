import _ from 'lodash';
import { isConfigDocument, type ConfigDocument } from './ConfigurationMerge.js';

export interface ModifiedValue {
    previous: unknown;
    current: unknown;
}

/**
 * Leaf-level difference between two configuration trees, keyed by dotted path.
 * Lists and empty mappings are leaves.
 */
export interface ConfigurationDiff {
    added: Record<string, unknown>;
    removed: Record<string, unknown>;
    modified: Record<string, ModifiedValue>;
    unchanged: Record<string, unknown>;
}

export const EMPTY_DIFF: ConfigurationDiff = Object.freeze({
    added: {},
    removed: {},
    modified: {},
    unchanged: {},
});

/**
 * Flatten a tree into dotted leaf paths.
 */
export function flattenConfiguration(tree: ConfigDocument, prefix = ''): Map<string, unknown> {
    const leaves = new Map<string, unknown>();
    for (const [key, value] of Object.entries(tree)) {
        const dotted = prefix ? `${prefix}.${key}` : key;
        if (isConfigDocument(value) && Object.keys(value).length > 0) {
            for (const [childKey, childValue] of flattenConfiguration(value, dotted)) {
                leaves.set(childKey, childValue);
            }
        } else {
            leaves.set(dotted, value);
        }
    }
    return leaves;
}

export function diffConfigurations(previous: ConfigDocument, current: ConfigDocument): ConfigurationDiff {
    const before = flattenConfiguration(previous);
    const after = flattenConfiguration(current);
    const diff: ConfigurationDiff = { added: {}, removed: {}, modified: {}, unchanged: {} };

    for (const [key, value] of after) {
        if (!before.has(key)) {
            diff.added[key] = _.cloneDeep(value);
        } else if (_.isEqual(before.get(key), value)) {
            diff.unchanged[key] = _.cloneDeep(value);
        } else {
            diff.modified[key] = { previous: _.cloneDeep(before.get(key)), current: _.cloneDeep(value) };
        }
    }
    for (const [key, value] of before) {
        if (!after.has(key)) {
            diff.removed[key] = _.cloneDeep(value);
        }
    }
    return diff;
}

/**
 * Read a dotted key from a flat path map. A key naming an inner node
 * collects every leaf below it into a nested object.
 */
export function readThrough(entries: Record<string, unknown>, key: string): unknown {
    if (Object.prototype.hasOwnProperty.call(entries, key)) {
        return _.cloneDeep(entries[key]);
    }
    const prefix = `${key}.`;
    let found = false;
    const collected: ConfigDocument = {};
    for (const [path, value] of Object.entries(entries)) {
        if (path.startsWith(prefix)) {
            found = true;
            _.set(collected, path.slice(prefix.length), _.cloneDeep(value));
        }
    }
    return found ? collected : undefined;
}

/**
 * True when `key` itself or any leaf below it appears in `entries`.
 */
export function touches(entries: Record<string, unknown>, key: string): boolean {
    const prefix = `${key}.`;
    return Object.keys(entries).some(path => path === key || path.startsWith(prefix));
}
