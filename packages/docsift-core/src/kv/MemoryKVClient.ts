/**
 * In-process IKVClient with the same command semantics as the Redis client.
 * Used by the test and development profiles and as the Redis stand-in in tests.
 */

import type { IKVClient } from './IKVClient.js';

export class MemoryKVClient implements IKVClient {
    private strings: Map<string, string> = new Map();
    private hashes: Map<string, Map<string, string>> = new Map();
    private lists: Map<string, string[]> = new Map();
    private closed = false;

    // ========================================================================
    // Basic Operations
    // ========================================================================

    async get(key: string): Promise<string | null> {
        return this.strings.get(key) ?? null;
    }

    async set(key: string, value: string): Promise<void> {
        this.assertType(key, 'string');
        this.strings.set(key, value);
    }

    async delete(...keys: string[]): Promise<number> {
        let deleted = 0;
        for (const key of keys) {
            if (this.strings.delete(key) || this.hashes.delete(key) || this.lists.delete(key)) {
                deleted++;
            }
        }
        return deleted;
    }

    async keys(prefix: string): Promise<string[]> {
        const all = [...this.strings.keys(), ...this.hashes.keys(), ...this.lists.keys()];
        return all.filter(key => key.startsWith(prefix)).sort();
    }

    async deleteRange(prefix: string): Promise<number> {
        return this.delete(...(await this.keys(prefix)));
    }

    async incr(key: string): Promise<number> {
        const current = this.strings.get(key) ?? '0';
        const parsed = Number.parseInt(current, 10);
        if (!/^-?\d+$/.test(current) || Number.isNaN(parsed)) {
            throw new Error(`ERR value at ${key} is not an integer`);
        }
        const next = parsed + 1;
        this.strings.set(key, String(next));
        return next;
    }

    // ========================================================================
    // Hashes
    // ========================================================================

    async hget(key: string, field: string): Promise<string | null> {
        return this.hashes.get(key)?.get(field) ?? null;
    }

    async hset(key: string, fields: Record<string, string>): Promise<void> {
        this.assertType(key, 'hash');
        let hash = this.hashes.get(key);
        if (!hash) {
            hash = new Map();
            this.hashes.set(key, hash);
        }
        for (const [field, value] of Object.entries(fields)) {
            hash.set(field, value);
        }
    }

    async hgetall(key: string): Promise<Record<string, string>> {
        return Object.fromEntries(this.hashes.get(key) ?? []);
    }

    async hdel(key: string, ...fields: string[]): Promise<number> {
        const hash = this.hashes.get(key);
        if (!hash) {
            return 0;
        }
        const deleted = fields.filter(field => hash.delete(field)).length;
        if (hash.size === 0) {
            this.hashes.delete(key);
        }
        return deleted;
    }

    // ========================================================================
    // Lists
    // ========================================================================

    async rpush(key: string, value: string): Promise<number> {
        this.assertType(key, 'list');
        const list = this.lists.get(key) ?? [];
        list.push(value);
        this.lists.set(key, list);
        return list.length;
    }

    async lmove(source: string, destination: string): Promise<string | null> {
        const list = this.lists.get(source);
        const value = list?.shift();
        if (value === undefined) {
            return null;
        }
        if (list?.length === 0) {
            this.lists.delete(source);
        }
        await this.rpush(destination, value);
        return value;
    }

    async lrem(key: string, value: string): Promise<number> {
        const list = this.lists.get(key);
        const index = list ? list.indexOf(value) : -1;
        if (!list || index < 0) {
            return 0;
        }
        list.splice(index, 1);
        if (list.length === 0) {
            this.lists.delete(key);
        }
        return 1;
    }

    async lrange(key: string, start: number, stop: number): Promise<string[]> {
        const list = this.lists.get(key) ?? [];
        const from = start < 0 ? Math.max(list.length + start, 0) : start;
        const to = stop < 0 ? list.length + stop : stop;
        return list.slice(from, to + 1);
    }

    async llen(key: string): Promise<number> {
        return this.lists.get(key)?.length ?? 0;
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    async health(): Promise<boolean> {
        return !this.closed;
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    /**
     * Redis rejects commands against a key holding another type (WRONGTYPE)
     */
    private assertType(key: string, type: 'string' | 'hash' | 'list'): void {
        const holds =
            (type !== 'string' && this.strings.has(key)) ||
            (type !== 'hash' && this.hashes.has(key)) ||
            (type !== 'list' && this.lists.has(key));
        if (holds) {
            throw new Error(`WRONGTYPE Operation against a key holding the wrong kind of value: ${key}`);
        }
    }
}
