/**
 * KV Client Interface - Abstraction layer for key-value storage
 *
 * The subset of Redis data structures the durable backends need: plain
 * string keys, hashes for records and lists for queues. Values are raw
 * strings; callers serialize.
 *
 * Key Structure (before the client prefix):
 * state:{partition}            → hash of key → {value, version}
 * item:{itemId}                → hash of flattened metadata fields
 * item:{itemId}:content        → encoded content
 * queue:{name}:pending         → list of task envelopes
 */

export interface KeyValuePair {
    key: string;
    value: string;
}

export interface IKVClient {
    // ========================================================================
    // Basic Operations
    // ========================================================================

    get(key: string): Promise<string | null>;

    set(key: string, value: string): Promise<void>;

    delete(...keys: string[]): Promise<number>;

    /**
     * Keys starting with `prefix` (without the client prefix)
     */
    keys(prefix: string): Promise<string[]>;

    /**
     * Delete all keys with a given prefix
     */
    deleteRange(prefix: string): Promise<number>;

    /**
     * Atomically increment an integer counter, returning the new value
     */
    incr(key: string): Promise<number>;

    // ========================================================================
    // Hashes
    // ========================================================================

    hget(key: string, field: string): Promise<string | null>;

    hset(key: string, fields: Record<string, string>): Promise<void>;

    hgetall(key: string): Promise<Record<string, string>>;

    hdel(key: string, ...fields: string[]): Promise<number>;

    // ========================================================================
    // Lists
    // ========================================================================

    /**
     * Append to the tail of a list, returning the new length
     */
    rpush(key: string, value: string): Promise<number>;

    /**
     * Atomically pop the head of `source` and append it to `destination`
     */
    lmove(source: string, destination: string): Promise<string | null>;

    /**
     * Remove the first occurrence of `value`
     */
    lrem(key: string, value: string): Promise<number>;

    lrange(key: string, start: number, stop: number): Promise<string[]>;

    llen(key: string): Promise<number>;

    // ========================================================================
    // Lifecycle
    // ========================================================================

    /**
     * Health check - verifies KV store is accessible
     */
    health(): Promise<boolean>;

    /**
     * Close connections and cleanup resources
     */
    close(): Promise<void>;
}

/**
 * KV Client configuration
 */
export interface KVClientConfig {
    /** Connection URL (e.g., redis://localhost:6379) */
    url: string;

    /** Operation timeout in ms (default: 30000) */
    timeout?: number;

    /** Key prefix for all operations (default: '' for none) */
    prefix?: string;
}
