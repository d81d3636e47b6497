/**
 * State storage backends.
 *
 * Entries are `(partition, key) → {value, version}`. Values are deep-copied
 * on the way in and out so callers never share references with the store.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import _ from 'lodash';
import PQueue from 'p-queue';
import type { IKVClient } from '../kv/IKVClient.js';
import type { StateStorage, VersionedEntry } from '../plugin-engine/types.js';
import { hasErrorCode } from '../utils/ErrnoUtils.js';

export interface StateEntry {
    value: unknown;
    version: number;
}

type PartitionTable = Record<string, Record<string, StateEntry>>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStateEntry(value: unknown): value is StateEntry {
    return isRecord(value) && typeof value.version === 'number' && 'value' in value;
}

function versionedEntries(entries: Record<string, StateEntry>, olderThanVersion: number): VersionedEntry[] {
    return Object.entries(entries)
        .filter(([, entry]) => entry.version < olderThanVersion)
        .map(([key, entry]): VersionedEntry => [key, _.cloneDeep(entry.value), entry.version]);
}

function keysWithValue(entries: Record<string, StateEntry>, value: unknown): string[] {
    return Object.entries(entries)
        .filter(([, entry]) => _.isEqual(entry.value, value))
        .map(([key]) => key);
}

// =============================================================================
// Memory
// =============================================================================

export class MemoryStateStorage implements StateStorage {
    protected partitions: PartitionTable = {};

    async store(partition: string, key: string, value: unknown, version = 1): Promise<void> {
        this.partitions[partition] = {
            ...this.partitions[partition],
            [key]: { value: _.cloneDeep(value), version },
        };
    }

    async get(partition: string, key: string, defaultValue?: unknown): Promise<unknown> {
        const entry = this.partitions[partition]?.[key];
        return entry ? _.cloneDeep(entry.value) : defaultValue;
    }

    async getVersionedState(partition: string, olderThanVersion: number): Promise<VersionedEntry[]> {
        return versionedEntries(this.partitions[partition] ?? {}, olderThanVersion);
    }

    async getAllKeysWithValue(partition: string, value: unknown): Promise<string[]> {
        return keysWithValue(this.partitions[partition] ?? {}, value);
    }

    async clear(): Promise<void> {
        this.partitions = {};
    }
}

// =============================================================================
// File
// =============================================================================

/**
 * Whole-table JSON file. Writes are serialized through a single-slot queue
 * and land via rename so a crash never leaves a truncated file.
 */
export class FileStateStorage implements StateStorage {
    private partitions: PartitionTable | null = null;
    private writes = new PQueue({ concurrency: 1 });

    constructor(private readonly filePath: string) {}

    async store(partition: string, key: string, value: unknown, version = 1): Promise<void> {
        await this.writes.add(async () => {
            const table = await this.load();
            table[partition] = { ...table[partition], [key]: { value: _.cloneDeep(value), version } };
            await this.persist(table);
        });
    }

    async get(partition: string, key: string, defaultValue?: unknown): Promise<unknown> {
        const entry = (await this.load())[partition]?.[key];
        return entry ? _.cloneDeep(entry.value) : defaultValue;
    }

    async getVersionedState(partition: string, olderThanVersion: number): Promise<VersionedEntry[]> {
        return versionedEntries((await this.load())[partition] ?? {}, olderThanVersion);
    }

    async getAllKeysWithValue(partition: string, value: unknown): Promise<string[]> {
        return keysWithValue((await this.load())[partition] ?? {}, value);
    }

    async clear(): Promise<void> {
        await this.writes.add(async () => {
            this.partitions = {};
            await this.persist(this.partitions);
        });
    }

    async close(): Promise<void> {
        await this.writes.onIdle();
    }

    private async load(): Promise<PartitionTable> {
        if (this.partitions) {
            return this.partitions;
        }
        let text: string;
        try {
            text = await fs.readFile(this.filePath, 'utf8');
        } catch (error) {
            if (!hasErrorCode(error, 'ENOENT')) {
                throw error;
            }
            text = '{}';
        }
        this.partitions = this.partitions ?? parsePartitionTable(JSON.parse(text), this.filePath);
        return this.partitions;
    }

    private async persist(table: PartitionTable): Promise<void> {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        const tmpPath = `${this.filePath}.tmp`;
        await fs.writeFile(tmpPath, JSON.stringify(table, null, 2), 'utf8');
        await fs.rename(tmpPath, this.filePath);
    }
}

function parsePartitionTable(value: unknown, source: string): PartitionTable {
    if (!isRecord(value)) {
        throw new Error(`State file ${source} does not hold an object`);
    }
    const table: PartitionTable = {};
    for (const [partition, entries] of Object.entries(value)) {
        if (isRecord(entries)) {
            table[partition] = _.pickBy(entries, isStateEntry);
        }
    }
    return table;
}

// =============================================================================
// KV (Redis)
// =============================================================================

/**
 * One hash per partition: `state:{partition}` field key → JSON {value, version}.
 */
export class KVStateStorage implements StateStorage {
    constructor(
        private readonly client: IKVClient,
        private readonly ownsClient = true
    ) {}

    async store(partition: string, key: string, value: unknown, version = 1): Promise<void> {
        const entry: StateEntry = { value, version };
        await this.client.hset(this.partitionKey(partition), { [key]: JSON.stringify(entry) });
    }

    async get(partition: string, key: string, defaultValue?: unknown): Promise<unknown> {
        const raw = await this.client.hget(this.partitionKey(partition), key);
        if (raw === null) {
            return defaultValue;
        }
        const entry: unknown = JSON.parse(raw);
        return isStateEntry(entry) ? entry.value : defaultValue;
    }

    async getVersionedState(partition: string, olderThanVersion: number): Promise<VersionedEntry[]> {
        return versionedEntries(await this.readPartition(partition), olderThanVersion);
    }

    async getAllKeysWithValue(partition: string, value: unknown): Promise<string[]> {
        return keysWithValue(await this.readPartition(partition), value);
    }

    async clear(): Promise<void> {
        await this.client.deleteRange('state:');
    }

    health(): Promise<boolean> {
        return this.client.health();
    }

    async close(): Promise<void> {
        if (this.ownsClient) {
            await this.client.close();
        }
    }

    private partitionKey(partition: string): string {
        return `state:${partition}`;
    }

    private async readPartition(partition: string): Promise<Record<string, StateEntry>> {
        const fields = await this.client.hgetall(this.partitionKey(partition));
        const entries: Record<string, StateEntry> = {};
        for (const [key, raw] of Object.entries(fields)) {
            const entry: unknown = JSON.parse(raw);
            if (isStateEntry(entry)) {
                entries[key] = entry;
            }
        }
        return entries;
    }
}
