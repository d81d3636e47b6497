import type { Configuration } from '../../config/Configuration.js';
import type { DataStorage, DataStorageProvider } from '../../plugin-engine/types.js';
import { KVDataStorage, MemoryDataStorage } from '../../storage/DataStorage.js';
import { connectRedis, type KVClientFactory } from './redis.js';

export class MemoryDataStorageProvider implements DataStorageProvider {
    readonly providerId = 'memory';

    createDataStorage(): DataStorage {
        return new MemoryDataStorage();
    }
}

export class RedisDataStorageProvider implements DataStorageProvider {
    readonly providerId = 'redis';

    constructor(private readonly connect: KVClientFactory = connectRedis) {}

    async createDataStorage(configuration: Configuration): Promise<DataStorage> {
        return new KVDataStorage(await this.connect(configuration));
    }
}
