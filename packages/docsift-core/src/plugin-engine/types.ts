/**
 * Plugin Engine Types
 *
 * Extension-point contracts, the backend interfaces the singleton providers
 * create, and the Host interfaces every plugin receives when invoked.
 */

import type { Content, Metadata } from '@docsift/content-model';
import type { Configuration } from '../config/Configuration.js';
import type { ConfigDocument } from '../config/ConfigurationMerge.js';
import type { Logger } from '../logging/Logger.js';
import type { Application } from '../startup/Application.js';
import type { TaskQueue } from '../tasks/types.js';

// =============================================================================
// Backends
// =============================================================================

/** [key, value, version] */
export type VersionedEntry = [key: string, value: unknown, version: number];

/**
 * Shared state store. Every call names the partition (owning plugin identity).
 */
export interface StateStorage {
    store(partition: string, key: string, value: unknown, version?: number): Promise<void>;
    get(partition: string, key: string, defaultValue?: unknown): Promise<unknown>;
    /** Entries of `partition` whose version is below `olderThanVersion` */
    getVersionedState(partition: string, olderThanVersion: number): Promise<VersionedEntry[]>;
    getAllKeysWithValue(partition: string, value: unknown): Promise<string[]>;
    clear(): Promise<void>;
    close?(): Promise<void>;
    /** false when the backing store does not answer */
    health?(): Promise<boolean>;
}

export interface CacheManager {
    /** Store content and return its cache id */
    save(partition: string, content: Content, extension?: string): Promise<string>;
    get(cacheId: string): Promise<Content | null>;
    remove(cacheId: string): Promise<boolean>;
    /** Remove several entries; returns the ids actually removed */
    removeAll(cacheIds: readonly string[]): Promise<string[]>;
    getAll(partition: string): Promise<string[]>;
    clear(): Promise<void>;
    close?(): Promise<void>;
    health?(): Promise<boolean>;
}

export interface StoredItem {
    id: string;
    content: Content;
    metadata: Metadata;
}

export interface DataStorage {
    /** Persist extracted content; returns the new item id */
    addItem(host: DataStorageHost, content: Content, metadata: Metadata): Promise<string>;
    updateItem(host: DataStorageHost, itemId: string, content: Content): Promise<void>;
    updateMetadata(host: DataStorageHost, itemId: string, metadata: Metadata): Promise<void>;
    /** Item stored for the same source url, if any */
    findItemId(host: DataStorageHost, metadata: Metadata): Promise<string | null>;
    findItem(itemId: string): Promise<StoredItem | null>;
    /** Remove an item; returns the cache id it referenced, if any */
    removeItem(host: DataStorageHost, itemId: string): Promise<string | null>;
    removeItemsByMetadata(host: DataStorageHost, metadata: Metadata): Promise<string[]>;
    removeItemsByUrl(host: DataStorageHost, url: string): Promise<string[]>;
    clear(): Promise<void>;
    close?(): Promise<void>;
    health?(): Promise<boolean>;
}

// =============================================================================
// Hosts
// =============================================================================

export interface StateManager {
    readonly partitionKey: string;
    store(key: string, value: unknown, version?: number): Promise<void>;
    get(key: string, defaultValue?: unknown): Promise<unknown>;
    getVersionedState(olderThanVersion: number): Promise<VersionedEntry[]>;
    getAllKeysWithValue(value: unknown): Promise<string[]>;
}

export interface BaseHost {
    /** Identity the registry assigned to the plugin this host was built for */
    readonly pluginId: string;
    readonly logger: Logger;
    readonly configuration: Configuration;
    readonly state: StateManager;
}

export type DataStorageHost = BaseHost;

export interface ContentSourceHost extends BaseHost {
    readonly cache: CacheManager;
    readonly dataStorage: DataStorage;
    /** Task id, or null when no task queue is configured */
    scheduleFetch(url: string, metadata?: Metadata): Promise<string | null>;
    scheduleCacheCleanup(cacheIds: readonly string[]): Promise<string | null>;
}

export interface ContentFetcherHost extends BaseHost {
    readonly cache: CacheManager;
    /** Metadata attached by the content source, if the fetch was scheduled with one */
    readonly discovered: Metadata | null;
    extractFile(content: Content, metadata: Metadata): Promise<string | null>;
}

export interface ContentExtractorHost extends BaseHost {
    readonly storage: DataStorage;
    readonly cache: CacheManager;
    extractFile(content: Content, metadata: Metadata): Promise<string | null>;
}

export interface HostFactoryView {
    createContentSourceHost(pluginId: string): ContentSourceHost;
    createContentFetcherHost(pluginId: string, discovered?: Metadata | null): ContentFetcherHost;
    createContentExtractorHost(pluginId: string): ContentExtractorHost;
    createDataStorageHost(pluginId: string): DataStorageHost;
    createLifecycleHost(pluginId: string): LifecycleHost;
}

export interface LifecycleHost extends BaseHost {
    readonly singletons: Singletons;
    readonly registry: RegistryView;
    readonly hosts: HostFactoryView;
}

// =============================================================================
// Singletons
// =============================================================================

export interface Singletons {
    logger: Logger;
    configuration: Configuration;
    stateStorage: StateStorage;
    cache: CacheManager;
    dataStorage: DataStorage;
    registry: RegistryView;
    /** null: synchronous-only operation */
    taskQueue: TaskQueue | null;
}

// =============================================================================
// Extension Points
// =============================================================================

export interface ConfigurationProvider {
    /** YAML text or an already parsed mapping */
    getDefaultConfiguration(): string | ConfigDocument;
    getConfigurationId(): string;
}

export interface CacheProvider {
    readonly providerId?: string;
    createCache(configuration: Configuration): CacheManager | Promise<CacheManager>;
}

export interface StateStorageProvider {
    readonly providerId?: string;
    createStateStorage(configuration: Configuration): StateStorage | Promise<StateStorage>;
}

export interface DataStorageProvider {
    readonly providerId?: string;
    createDataStorage(configuration: Configuration): DataStorage | Promise<DataStorage>;
}

export interface TaskExecutionProvider {
    readonly providerId?: string;
    /** null selects synchronous-only operation */
    createTaskQueue(configuration: Configuration): TaskQueue | null | Promise<TaskQueue | null>;
}

/** [url, metadata] */
export type DiscoveredItem = [url: string, metadata: Metadata];

export interface ContentSource {
    /** One-shot enumeration, re-run at each lifecycle start */
    discoverContent(host: ContentSourceHost): Promise<DiscoveredItem[]>;
    startSource(host: ContentSourceHost): Promise<void>;
    stopSource(host: ContentSourceHost): Promise<void>;
    getConfigurationId(): string;
}

export interface ContentFetcher {
    canFetch(host: ContentFetcherHost, url: string): boolean;
    fetch(host: ContentFetcherHost, url: string): Promise<void>;
}

export interface ContentExtractor {
    canExtract(url: string, mimeType?: string): boolean;
    /** Advisory only; never used for dispatch */
    preferredMimeTypes(): string[];
    extract(host: ContentExtractorHost, content: Content, metadata: Metadata): Promise<void>;
}

export interface LifecycleAction {
    onStart(host: LifecycleHost): Promise<void>;
    onStop(host: LifecycleHost): Promise<void>;
}

export interface ResetAction {
    hardReset(host: LifecycleHost, configuration: Configuration): Promise<void> | void;
    softReset(host: LifecycleHost, configuration: Configuration): Promise<void> | void;
}

export interface CommandContext {
    /** Arguments after the command name */
    args: string[];
    logger: Logger;
    /** Bootstrapped, not yet started */
    application: Application;
    /** Aborted when the process is asked to shut down */
    signal: AbortSignal;
    /** Command output, one line per call */
    print(line: string): void;
}

export interface CommandDefinition {
    name: string;
    description: string;
    /** Resolves to the process exit code */
    run(context: CommandContext): Promise<number>;
}

export interface CommandTable {
    add(command: CommandDefinition): void;
}

export interface CommandRegistrar {
    registerCommands(commands: CommandTable): void;
}

export interface ExtensionPointMap {
    ConfigurationProvider: ConfigurationProvider;
    CacheProvider: CacheProvider;
    StateStorageProvider: StateStorageProvider;
    DataStorageProvider: DataStorageProvider;
    TaskExecutionProvider: TaskExecutionProvider;
    ContentSource: ContentSource;
    ContentExtractor: ContentExtractor;
    ContentFetcher: ContentFetcher;
    LifecycleAction: LifecycleAction;
    ResetAction: ResetAction;
    CommandRegistrar: CommandRegistrar;
}

export type ExtensionPoint = keyof ExtensionPointMap;

export interface Registration<P extends ExtensionPoint = ExtensionPoint> {
    extensionPoint: P;
    /** Stable identity; partition key for the plugin's state */
    pluginId: string;
    /** Module the plugin was discovered in, or 'inline' */
    origin: string;
    implementation: ExtensionPointMap[P];
}

export interface RegisterOptions {
    pluginId?: string;
    origin?: string;
}

/**
 * Read-only registry surface handed to hosts and singletons.
 */
export interface RegistryView {
    getRegistrations<P extends ExtensionPoint>(extensionPoint: P): Registration<P>[];
    getConfigurationProviders(): ConfigurationProvider[];
    getCacheProviders(): CacheProvider[];
    getStateStorageProviders(): StateStorageProvider[];
    getDataStorageProviders(): DataStorageProvider[];
    getTaskExecutionProviders(): TaskExecutionProvider[];
    getContentSources(): ContentSource[];
    getContentExtractors(): ContentExtractor[];
    getContentFetchers(): ContentFetcher[];
    getLifecycleActions(): LifecycleAction[];
    getResetActions(): ResetAction[];
    getCommandRegistrars(): CommandRegistrar[];
}
