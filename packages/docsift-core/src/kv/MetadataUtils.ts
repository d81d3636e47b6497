/**
 * Utility functions for converting between nested JSON records and flat
 * field/value pairs, for storing records as Redis hashes.
 *
 * Leaves are JSON-encoded so types survive the round trip. Arrays and empty
 * mappings are stored as single leaves. Path segments are URI-encoded so a
 * key containing '/' stays one segment.
 */

import type { KeyValuePair } from './IKVClient.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Flattens a nested record into field/value pairs.
 *
 * @example
 * flattenMetadata({ title: "Notes", extra: { file_size: 12 } })
 * // Returns:
 * // [
 * //   { key: "title", value: "\"Notes\"" },
 * //   { key: "extra/file_size", value: "12" }
 * // ]
 */
export function flattenMetadata(record: Record<string, unknown>, excludeFields: string[] = []): KeyValuePair[] {
    const pairs: KeyValuePair[] = [];

    function flatten(value: unknown, path: string): void {
        if (value === undefined) {
            return;
        }
        if (isPlainObject(value) && Object.keys(value).length > 0) {
            for (const [key, child] of Object.entries(value)) {
                flatten(child, path ? `${path}/${encodeURIComponent(key)}` : encodeURIComponent(key));
            }
            return;
        }
        pairs.push({ key: path, value: JSON.stringify(value) });
    }

    for (const [key, value] of Object.entries(record)) {
        if (!excludeFields.includes(key)) {
            flatten(value, encodeURIComponent(key));
        }
    }
    return pairs;
}

/**
 * Reconstructs a nested record from flat field/value pairs.
 */
export function reconstructMetadata(pairs: readonly KeyValuePair[]): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const { key, value } of pairs) {
        const parts = key.split('/').map(part => decodeURIComponent(part));
        let current = result;
        for (const part of parts.slice(0, -1)) {
            const next = current[part];
            if (isPlainObject(next)) {
                current = next;
            } else {
                const created: Record<string, unknown> = {};
                current[part] = created;
                current = created;
            }
        }
        current[parts[parts.length - 1]] = parseValue(value);
    }
    return result;
}

/**
 * Parses a stored leaf. Values that are not JSON are kept as strings.
 */
export function parseValue(value: string): unknown {
    try {
        return JSON.parse(value);
    } catch {
        return value;
    }
}

export function toHashFields(pairs: readonly KeyValuePair[]): Record<string, string> {
    return Object.fromEntries(pairs.map(pair => [pair.key, pair.value]));
}

export function fromHashFields(fields: Record<string, string>): KeyValuePair[] {
    return Object.entries(fields).map(([key, value]) => ({ key, value }));
}
