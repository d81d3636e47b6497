/**
 * KV Module - key-value storage used by the durable backends
 *
 * - IKVClient interface for KV storage abstraction
 * - RedisKVClient for Redis-based storage
 * - MemoryKVClient for in-process storage
 * - MetadataUtils for flattening/reconstructing nested records
 */

export * from './IKVClient.js';
export * from './RedisClient.js';
export * from './MemoryKVClient.js';
export * from './MetadataUtils.js';
