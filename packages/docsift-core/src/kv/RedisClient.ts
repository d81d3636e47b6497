/**
 * Redis KV Client - Implements IKVClient interface using Redis
 *
 * Every key is prefixed with the configured namespace (e.g. 'docsift:') so
 * several deployments can share one Redis database.
 */

import { Redis } from 'ioredis';
import type { IKVClient, KVClientConfig } from './IKVClient.js';

export class RedisKVClient implements IKVClient {
    private redis: Redis;
    private timeout: number;
    private prefix: string;
    private isConnected: boolean = false;

    constructor(config: KVClientConfig) {
        this.timeout = config.timeout || 30000;
        this.prefix = config.prefix || '';

        this.redis = new Redis(config.url, {
            commandTimeout: this.timeout,
            connectTimeout: this.timeout,
            lazyConnect: true,
            maxRetriesPerRequest: 3,
            enableOfflineQueue: true,
            retryStrategy: times => {
                const delay = Math.min(times * 200, 2000);
                console.log(`[Redis] Retry attempt ${times}, waiting ${delay}ms`);
                return delay;
            },
        });

        this.redis.on('connect', () => {
            this.isConnected = true;
            console.log('[Redis] Connected');
        });

        this.redis.on('error', (err: Error) => {
            console.error('[Redis] Error:', err.message);
        });

        this.redis.on('close', () => {
            this.isConnected = false;
            console.log('[Redis] Connection closed');
        });
    }

    /**
     * Connect to Redis (call before using other methods)
     */
    async connect(): Promise<void> {
        if (this.isConnected) return;
        await this.redis.connect();
    }

    /**
     * Build the full Redis key with optional prefix
     */
    private buildKey(key: string): string {
        return this.prefix ? `${this.prefix}${key}` : key;
    }

    private stripPrefix(key: string): string {
        return this.prefix && key.startsWith(this.prefix) ? key.slice(this.prefix.length) : key;
    }

    // ========================================================================
    // Basic Operations
    // ========================================================================

    async get(key: string): Promise<string | null> {
        return this.redis.get(this.buildKey(key));
    }

    async set(key: string, value: string): Promise<void> {
        await this.redis.set(this.buildKey(key), value);
    }

    async delete(...keys: string[]): Promise<number> {
        if (keys.length === 0) return 0;
        return this.redis.del(...keys.map(key => this.buildKey(key)));
    }

    async keys(prefix: string): Promise<string[]> {
        const found: string[] = [];
        // Use SCAN (don't use KEYS in production)
        let cursor = '0';
        do {
            const [nextCursor, keys] = await this.redis.scan(
                cursor,
                'MATCH',
                `${this.buildKey(prefix)}*`,
                'COUNT',
                1000
            );
            cursor = nextCursor;
            found.push(...keys.map(key => this.stripPrefix(key)));
        } while (cursor !== '0');

        return [...new Set(found)].sort();
    }

    async deleteRange(prefix: string): Promise<number> {
        return this.delete(...(await this.keys(prefix)));
    }

    async incr(key: string): Promise<number> {
        return this.redis.incr(this.buildKey(key));
    }

    // ========================================================================
    // Hashes
    // ========================================================================

    async hget(key: string, field: string): Promise<string | null> {
        return this.redis.hget(this.buildKey(key), field);
    }

    async hset(key: string, fields: Record<string, string>): Promise<void> {
        if (Object.keys(fields).length === 0) return;
        await this.redis.hset(this.buildKey(key), fields);
    }

    async hgetall(key: string): Promise<Record<string, string>> {
        return this.redis.hgetall(this.buildKey(key));
    }

    async hdel(key: string, ...fields: string[]): Promise<number> {
        if (fields.length === 0) return 0;
        return this.redis.hdel(this.buildKey(key), ...fields);
    }

    // ========================================================================
    // Lists
    // ========================================================================

    async rpush(key: string, value: string): Promise<number> {
        return this.redis.rpush(this.buildKey(key), value);
    }

    async lmove(source: string, destination: string): Promise<string | null> {
        return this.redis.lmove(this.buildKey(source), this.buildKey(destination), 'LEFT', 'RIGHT');
    }

    async lrem(key: string, value: string): Promise<number> {
        return this.redis.lrem(this.buildKey(key), 1, value);
    }

    async lrange(key: string, start: number, stop: number): Promise<string[]> {
        return this.redis.lrange(this.buildKey(key), start, stop);
    }

    async llen(key: string): Promise<number> {
        return this.redis.llen(this.buildKey(key));
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    async health(): Promise<boolean> {
        try {
            const result = await this.redis.ping();
            return result === 'PONG';
        } catch (error) {
            console.warn('[Redis] Health check failed:', error);
            return false;
        }
    }

    async close(): Promise<void> {
        await this.redis.quit();
        this.isConnected = false;
    }

    /**
     * Check if client is connected
     */
    isHealthy(): boolean {
        return this.isConnected;
    }
}
