/**
 * Plugin Hosts
 *
 * The per-invocation facade a plugin receives: a scoped logger, the
 * configuration, state partitioned by the plugin's registered identity, and
 * the scheduling calls of the pipeline stage it belongs to.
 */

import type { Content, Metadata } from '@docsift/content-model';
import type { Configuration } from '../config/Configuration.js';
import type { Logger } from '../logging/Logger.js';
import { cleanupCacheTask, extractContentTask, fetchContentTask, type TaskRequest } from '../tasks/types.js';
import type {
    BaseHost,
    CacheManager,
    ContentExtractorHost,
    ContentFetcherHost,
    ContentSourceHost,
    DataStorage,
    DataStorageHost,
    HostFactoryView,
    LifecycleHost,
    RegistryView,
    Singletons,
    StateManager,
    StateStorage,
    VersionedEntry,
} from './types.js';

// =============================================================================
// State partitioning
// =============================================================================

/**
 * StateManager bound to one partition. The partition key is passed on every call.
 */
export class PartitionedStateManager implements StateManager {
    constructor(
        private readonly storage: StateStorage,
        readonly partitionKey: string
    ) {}

    store(key: string, value: unknown, version = 1): Promise<void> {
        return this.storage.store(this.partitionKey, key, value, version);
    }

    get(key: string, defaultValue?: unknown): Promise<unknown> {
        return this.storage.get(this.partitionKey, key, defaultValue);
    }

    getVersionedState(olderThanVersion: number): Promise<VersionedEntry[]> {
        return this.storage.getVersionedState(this.partitionKey, olderThanVersion);
    }

    getAllKeysWithValue(value: unknown): Promise<string[]> {
        return this.storage.getAllKeysWithValue(this.partitionKey, value);
    }
}

// =============================================================================
// Hosts
// =============================================================================

export class PluginHost implements BaseHost, DataStorageHost {
    readonly logger: Logger;
    readonly state: StateManager;

    constructor(
        readonly pluginId: string,
        protected readonly services: Singletons
    ) {
        this.logger = services.logger.child(`plugin:${pluginId}`);
        this.state = new PartitionedStateManager(services.stateStorage, pluginId);
    }

    get configuration(): Configuration {
        return this.services.configuration;
    }

    /**
     * Hand a unit to the task queue. Without one, nothing runs and null is returned.
     */
    protected async schedule(request: TaskRequest, description: string): Promise<string | null> {
        const queue = this.services.taskQueue;
        if (!queue) {
            this.logger.info(`Synchronous execution: would ${description}`);
            return null;
        }
        const taskId = await queue.schedule(request);
        this.logger.debug(`Scheduled ${request.name} as ${taskId}`);
        return taskId;
    }
}

export class ContentSourcePluginHost extends PluginHost implements ContentSourceHost {
    get cache(): CacheManager {
        return this.services.cache;
    }

    get dataStorage(): DataStorage {
        return this.services.dataStorage;
    }

    scheduleFetch(url: string, metadata?: Metadata): Promise<string | null> {
        return this.schedule(fetchContentTask(url, metadata), `fetch ${url}`);
    }

    scheduleCacheCleanup(cacheIds: readonly string[]): Promise<string | null> {
        if (cacheIds.length === 0) {
            return Promise.resolve(null);
        }
        return this.schedule(cleanupCacheTask(cacheIds), `clean up ${cacheIds.length} cache entries`);
    }
}

export class ContentFetcherPluginHost extends PluginHost implements ContentFetcherHost {
    constructor(
        pluginId: string,
        singletons: Singletons,
        readonly discovered: Metadata | null = null
    ) {
        super(pluginId, singletons);
    }

    get cache(): CacheManager {
        return this.services.cache;
    }

    extractFile(content: Content, metadata: Metadata): Promise<string | null> {
        return this.schedule(extractContentTask(content, metadata), `extract ${metadata.sourceUrl}`);
    }
}

export class ContentExtractorPluginHost extends PluginHost implements ContentExtractorHost {
    get storage(): DataStorage {
        return this.services.dataStorage;
    }

    get cache(): CacheManager {
        return this.services.cache;
    }

    extractFile(content: Content, metadata: Metadata): Promise<string | null> {
        return this.schedule(extractContentTask(content, metadata), `extract ${metadata.sourceUrl}`);
    }
}

export class LifecyclePluginHost extends PluginHost implements LifecycleHost {
    constructor(
        pluginId: string,
        singletons: Singletons,
        readonly hosts: HostFactoryView
    ) {
        super(pluginId, singletons);
    }

    get registry(): RegistryView {
        return this.services.registry;
    }

    get singletons(): Singletons {
        return this.services;
    }
}

// =============================================================================
// Host Factory
// =============================================================================

/**
 * Builds hosts over one Singletons set. The identity is always supplied by the caller.
 */
export class HostFactory implements HostFactoryView {
    constructor(private readonly singletons: Singletons) {}

    createContentSourceHost(pluginId: string): ContentSourceHost {
        return new ContentSourcePluginHost(pluginId, this.singletons);
    }

    createContentFetcherHost(pluginId: string, discovered: Metadata | null = null): ContentFetcherHost {
        return new ContentFetcherPluginHost(pluginId, this.singletons, discovered);
    }

    createContentExtractorHost(pluginId: string): ContentExtractorHost {
        return new ContentExtractorPluginHost(pluginId, this.singletons);
    }

    createDataStorageHost(pluginId: string): DataStorageHost {
        return new PluginHost(pluginId, this.singletons);
    }

    createLifecycleHost(pluginId: string): LifecycleHost {
        return new LifecyclePluginHost(pluginId, this.singletons, this);
    }
}
