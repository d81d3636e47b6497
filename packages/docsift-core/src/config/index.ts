export { config } from './EnvConfig.js';
export type { EnvConfig } from './EnvConfig.js';
export { Configuration } from './Configuration.js';
export { ConfigurationFactory, parseConfigurationDocument } from './ConfigurationFactory.js';
export type { ConfigurationBuildOptions } from './ConfigurationFactory.js';
export { diffConfigurations, flattenConfiguration, EMPTY_DIFF } from './ConfigurationDiff.js';
export type { ConfigurationDiff, ModifiedValue } from './ConfigurationDiff.js';
export { mergeConfiguration, mergeConfigurationLayers, isConfigDocument } from './ConfigurationMerge.js';
export type { ConfigDocument } from './ConfigurationMerge.js';
export { substituteEnvVars, substituteEnvVarsInObject } from './EnvSubstitution.js';
