export * from './types.js';
export { PluginRegistry, MODULE_HOOKS, MULTI_CAPABILITY_HOOK } from './PluginRegistry.js';
export type { RegisterCallback, RegistrationRejectedEvent } from './PluginRegistry.js';
export { REQUIRED_CAPABILITIES, EXTENSION_POINTS, isExtensionPoint, missingCapabilities, hasCapabilities } from './capabilities.js';
export {
    HostFactory,
    PartitionedStateManager,
    PluginHost,
    ContentSourcePluginHost,
    ContentFetcherPluginHost,
    ContentExtractorPluginHost,
    LifecyclePluginHost,
} from './hosts.js';
