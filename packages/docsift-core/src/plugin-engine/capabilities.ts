import type { ExtensionPoint, ExtensionPointMap } from './types.js';

/**
 * Methods an implementation must expose to be accepted for an extension point.
 */
export const REQUIRED_CAPABILITIES: { readonly [P in ExtensionPoint]: readonly string[] } = {
    ConfigurationProvider: ['getDefaultConfiguration', 'getConfigurationId'],
    CacheProvider: ['createCache'],
    StateStorageProvider: ['createStateStorage'],
    DataStorageProvider: ['createDataStorage'],
    TaskExecutionProvider: ['createTaskQueue'],
    ContentSource: ['discoverContent', 'startSource', 'stopSource', 'getConfigurationId'],
    ContentExtractor: ['canExtract', 'preferredMimeTypes', 'extract'],
    ContentFetcher: ['canFetch', 'fetch'],
    LifecycleAction: ['onStart', 'onStop'],
    ResetAction: ['hardReset', 'softReset'],
    CommandRegistrar: ['registerCommands'],
};

export const EXTENSION_POINTS: readonly ExtensionPoint[] = [
    'ConfigurationProvider',
    'CacheProvider',
    'StateStorageProvider',
    'DataStorageProvider',
    'TaskExecutionProvider',
    'ContentSource',
    'ContentExtractor',
    'ContentFetcher',
    'LifecycleAction',
    'ResetAction',
    'CommandRegistrar',
];

export function isExtensionPoint(value: string): value is ExtensionPoint {
    return EXTENSION_POINTS.some(point => point === value);
}

/**
 * Names of the required methods `implementation` lacks; empty when it conforms.
 */
export function missingCapabilities(extensionPoint: ExtensionPoint, implementation: unknown): string[] {
    const required = REQUIRED_CAPABILITIES[extensionPoint];
    if ((typeof implementation !== 'object' && typeof implementation !== 'function') || implementation === null) {
        return [...required];
    }
    return required.filter(name => typeof Reflect.get(implementation, name) !== 'function');
}

export function hasCapabilities<P extends ExtensionPoint>(
    extensionPoint: P,
    implementation: unknown
): implementation is ExtensionPointMap[P] {
    return missingCapabilities(extensionPoint, implementation).length === 0;
}
