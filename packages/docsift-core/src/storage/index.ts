export { MemoryStateStorage, FileStateStorage, KVStateStorage } from './StateStorage.js';
export type { StateEntry } from './StateStorage.js';
export { MemoryCacheManager, FileCacheManager, formatCacheId, parseCacheId } from './CacheManager.js';
export type { CacheId } from './CacheManager.js';
export { MemoryDataStorage, KVDataStorage, cacheIdOf, CACHE_ID_FIELD } from './DataStorage.js';
