import type { RegisterCallback } from '../../plugin-engine/PluginRegistry.js';
import { FileCacheProvider } from '../../plugins/providers/CacheProviders.js';
import { RedisDataStorageProvider } from '../../plugins/providers/DataStorageProviders.js';
import { RedisStateStorageProvider } from '../../plugins/providers/StateStorageProviders.js';
import { DurableTaskExecutionProvider } from '../../plugins/providers/TaskExecutionProviders.js';
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
    register(new ProfileConfigurationProvider('production', new URL('./production.yaml', import.meta.url)));
}

export function registerCacheProvider(register: RegisterCallback): void {
    register(new FileCacheProvider());
}

export function registerStateStorageProvider(register: RegisterCallback): void {
    register(new RedisStateStorageProvider());
}

export function registerDataStorageProvider(register: RegisterCallback): void {
    register(new RedisDataStorageProvider());
}

export function registerTaskExecutionProvider(register: RegisterCallback): void {
    register(new DurableTaskExecutionProvider());
}

export function registerContentSource(register: RegisterCallback): void {
    register(new DirectoryContentSource());
}
