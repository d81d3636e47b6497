/**
 * Singleton selection and construction.
 *
 * For every backend kind the configuration key `providers.<kind>` names the
 * provider to use by its `providerId`. Without the key the first registered
 * provider is used.
 */

import { describeError } from '@docsift/async-utils';
import type { Configuration } from '../config/Configuration.js';
import { StartupError } from '../errors.js';
import type { Logger } from '../logging/Logger.js';
import type { RegistryView, Singletons } from '../plugin-engine/types.js';
import { PipelineTaskExecutor } from '../tasks/PipelineTaskExecutor.js';

export type SingletonKind = 'cache' | 'state_storage' | 'data_storage' | 'task_execution';

export function selectionKey(kind: SingletonKind): string {
    return `providers.${kind}`;
}

/**
 * Pick one provider of a kind. Returns null when none is registered.
 */
export function selectProvider<T extends { readonly providerId?: string }>(
    kind: SingletonKind,
    providers: readonly T[],
    configuration: Configuration
): T | null {
    const key = selectionKey(kind);
    const wanted = configuration.get(key);
    if (wanted === undefined || wanted === null || wanted === '') {
        return providers[0] ?? null;
    }
    if (typeof wanted !== 'string') {
        throw new StartupError(`${key} must be a provider id`);
    }
    const match = providers.find(provider => provider.providerId === wanted);
    if (!match) {
        const available = providers.map(p => p.providerId ?? '(unnamed)').join(', ') || 'none';
        throw new StartupError(`${key} names unknown provider '${wanted}' (available: ${available})`);
    }
    return match;
}

function required<T>(kind: SingletonKind, provider: T | null, extensionPoint: string): T {
    if (!provider) {
        throw new StartupError(`No ${extensionPoint} registered for ${kind}`);
    }
    return provider;
}

/**
 * Release whatever a Singletons set holds. Failures are logged, never thrown.
 */
export async function closeSingletons(
    resources: Partial<Pick<Singletons, 'taskQueue' | 'cache' | 'dataStorage' | 'stateStorage'>>,
    logger: Logger
): Promise<void> {
    const closers: Array<[string, { close?(): Promise<void> } | null | undefined]> = [
        ['task queue', resources.taskQueue],
        ['cache', resources.cache],
        ['data storage', resources.dataStorage],
        ['state storage', resources.stateStorage],
    ];
    for (const [name, resource] of closers) {
        if (!resource?.close) continue;
        try {
            await resource.close();
        } catch (error) {
            logger.warn(`Failed to close ${name}: ${describeError(error)}`);
        }
    }
}

/**
 * Instantiate exactly one backend of each kind. A task-execution provider
 * that is missing or returns null selects synchronous-only operation.
 * Backends created before a failure are closed again.
 */
export async function createSingletons(
    registry: RegistryView,
    configuration: Configuration,
    logger: Logger
): Promise<Singletons> {
    const created: Partial<Singletons> = {};
    try {
        const cacheProvider = required(
            'cache',
            selectProvider('cache', registry.getCacheProviders(), configuration),
            'CacheProvider'
        );
        created.cache = await cacheProvider.createCache(configuration);

        const stateProvider = required(
            'state_storage',
            selectProvider('state_storage', registry.getStateStorageProviders(), configuration),
            'StateStorageProvider'
        );
        created.stateStorage = await stateProvider.createStateStorage(configuration);

        const dataProvider = required(
            'data_storage',
            selectProvider('data_storage', registry.getDataStorageProviders(), configuration),
            'DataStorageProvider'
        );
        created.dataStorage = await dataProvider.createDataStorage(configuration);

        const taskProvider = selectProvider('task_execution', registry.getTaskExecutionProviders(), configuration);
        const taskQueue = taskProvider ? await taskProvider.createTaskQueue(configuration) : null;
        created.taskQueue = taskQueue;

        const singletons: Singletons = {
            logger,
            configuration,
            stateStorage: created.stateStorage,
            cache: created.cache,
            dataStorage: created.dataStorage,
            registry,
            taskQueue,
        };
        taskQueue?.bind?.(new PipelineTaskExecutor(singletons));

        logger.info(
            `Singletons ready (cache=${cacheProvider.providerId ?? 'default'}, ` +
                `state=${stateProvider.providerId ?? 'default'}, data=${dataProvider.providerId ?? 'default'}, ` +
                `tasks=${taskQueue ? taskQueue.mode : 'synchronous'})`
        );
        return singletons;
    } catch (error) {
        await closeSingletons(created, logger);
        if (error instanceof StartupError) {
            throw error;
        }
        throw new StartupError(`Failed to create singletons: ${describeError(error)}`, { cause: error });
    }
}
