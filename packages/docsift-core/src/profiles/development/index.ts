import type { RegisterCallback } from '../../plugin-engine/PluginRegistry.js';
import { FileCacheProvider } from '../../plugins/providers/CacheProviders.js';
import { MemoryDataStorageProvider } from '../../plugins/providers/DataStorageProviders.js';
import { FileStateStorageProvider } from '../../plugins/providers/StateStorageProviders.js';
import {
    ImmediateTaskExecutionProvider,
    SynchronousTaskExecutionProvider,
} from '../../plugins/providers/TaskExecutionProviders.js';
import { DirectoryContentSource, DirectorySourceDefaults } from '../../plugins/sources/DirectoryContentSource.js';
import { ProfileConfigurationProvider } from '../ProfileConfigurationProvider.js';

export {
    registerContentFetcher,
    registerContentExtractor,
    registerLifecycleAction,
    registerResetAction,
    registerCommandRegistrar,
} from '../common.js';

/** Profile YAML last, so it overrides the plugin defaults */
export function registerConfigurationProvider(register: RegisterCallback): void {
    register(new DirectorySourceDefaults());
    register(new ProfileConfigurationProvider('development', new URL('./development.yaml', import.meta.url)));
}

export function registerCacheProvider(register: RegisterCallback): void {
    register(new FileCacheProvider());
}

export function registerStateStorageProvider(register: RegisterCallback): void {
    register(new FileStateStorageProvider());
}

export function registerDataStorageProvider(register: RegisterCallback): void {
    register(new MemoryDataStorageProvider());
}

/** `providers.task_execution: synchronous` turns scheduling off */
export function registerTaskExecutionProvider(register: RegisterCallback): void {
    register(new ImmediateTaskExecutionProvider());
    register(new SynchronousTaskExecutionProvider());
}

export function registerContentSource(register: RegisterCallback): void {
    register(new DirectoryContentSource());
}
