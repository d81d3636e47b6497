import * as path from 'path';
import type { Configuration } from '../../config/Configuration.js';
import { config } from '../../config/EnvConfig.js';
import type { CacheManager, CacheProvider } from '../../plugin-engine/types.js';
import { FileCacheManager, MemoryCacheManager } from '../../storage/CacheManager.js';

export class MemoryCacheProvider implements CacheProvider {
    readonly providerId = 'memory';

    createCache(): CacheManager {
        return new MemoryCacheManager();
    }
}

/**
 * `cache.path`, default `<DOCSIFT_DATA_DIR>/cache`.
 */
export class FileCacheProvider implements CacheProvider {
    readonly providerId = 'file';

    createCache(configuration: Configuration): CacheManager {
        const dir = configuration.getString('cache.path', path.join(config.DOCSIFT_DATA_DIR, 'cache'));
        return new FileCacheManager(dir);
    }
}
