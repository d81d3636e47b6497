import type { Configuration } from '../../config/Configuration.js';
import { config } from '../../config/EnvConfig.js';
import type { IKVClient } from '../../kv/IKVClient.js';
import { RedisKVClient } from '../../kv/RedisClient.js';

/** Builds the KV client a Redis-backed provider talks to */
export type KVClientFactory = (configuration: Configuration) => Promise<IKVClient>;

/**
 * `redis.url` / `redis.prefix` from the configuration, REDIS_URL / REDIS_PREFIX otherwise.
 * Connects before returning so an unreachable server fails the startup.
 */
export const connectRedis: KVClientFactory = async configuration => {
    const client = new RedisKVClient({
        url: configuration.getString('redis.url', config.REDIS_URL),
        prefix: configuration.getString('redis.prefix', config.REDIS_PREFIX),
        timeout: configuration.getNumber('redis.timeout_ms', 30000),
    });
    await client.connect();
    return client;
};
