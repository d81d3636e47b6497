import * as path from 'path';
import type { Configuration } from '../../config/Configuration.js';
import { config } from '../../config/EnvConfig.js';
import type { StateStorage, StateStorageProvider } from '../../plugin-engine/types.js';
import { FileStateStorage, KVStateStorage, MemoryStateStorage } from '../../storage/StateStorage.js';
import { connectRedis, type KVClientFactory } from './redis.js';

export class MemoryStateStorageProvider implements StateStorageProvider {
    readonly providerId = 'memory';

    createStateStorage(): StateStorage {
        return new MemoryStateStorage();
    }
}

/**
 * JSON file at `state.path`, default `<DOCSIFT_DATA_DIR>/state.json`.
 */
export class FileStateStorageProvider implements StateStorageProvider {
    readonly providerId = 'file';

    createStateStorage(configuration: Configuration): StateStorage {
        return new FileStateStorage(
            configuration.getString('state.path', path.join(config.DOCSIFT_DATA_DIR, 'state.json'))
        );
    }
}

export class RedisStateStorageProvider implements StateStorageProvider {
    readonly providerId = 'redis';

    constructor(private readonly connect: KVClientFactory = connectRedis) {}

    async createStateStorage(configuration: Configuration): Promise<StateStorage> {
        return new KVStateStorage(await this.connect(configuration));
    }
}
