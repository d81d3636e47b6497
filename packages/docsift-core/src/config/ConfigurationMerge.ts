import _ from 'lodash';

/** A nested configuration document (parsed YAML mapping) */
export type ConfigDocument = Record<string, unknown>;

export function isConfigDocument(value: unknown): value is ConfigDocument {
    return _.isPlainObject(value);
}

/**
 * Recursive structural merge for configuration layers.
 *
 * Mappings merge key by key and the override wins every other conflict.
 * Lists are replaced, never concatenated (unlike Metadata.merge).
 */
export function mergeConfiguration(base: ConfigDocument, override: ConfigDocument): ConfigDocument {
    const merged: ConfigDocument = _.mergeWith({}, base, override, (objValue: unknown, srcValue: unknown): unknown => {
        if (srcValue === undefined) {
            return undefined;
        }
        if (isConfigDocument(objValue) && isConfigDocument(srcValue)) {
            return undefined;
        }
        return _.cloneDeep(srcValue);
    });
    return merged;
}

/**
 * Fold layers left to right; later layers take precedence.
 */
export function mergeConfigurationLayers(layers: readonly ConfigDocument[]): ConfigDocument {
    return layers.reduce<ConfigDocument>((acc, layer) => mergeConfiguration(acc, layer), {});
}
