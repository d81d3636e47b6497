import type { LifecycleHost, ResetAction } from '../../plugin-engine/types.js';
import { DurableTaskQueue } from '../../tasks/DurableTaskQueue.js';

/**
 * Hard: cache, data storage and state storage are emptied. Soft: the cache only.
 */
export class StorageResetAction implements ResetAction {
    readonly pluginId = 'storage_reset';

    async hardReset(host: LifecycleHost): Promise<void> {
        const { cache, dataStorage, stateStorage } = host.singletons;
        await cache.clear();
        await dataStorage.clear();
        await stateStorage.clear();
        host.logger.info('Cleared cache, data storage and state storage');
    }

    async softReset(host: LifecycleHost): Promise<void> {
        await host.singletons.cache.clear();
        host.logger.info('Cleared cache');
    }
}

/**
 * Hard: every queued, in-flight and dead-lettered unit is dropped.
 * Soft: units stuck in processing go back to pending.
 */
export class TaskQueueResetAction implements ResetAction {
    readonly pluginId = 'task_queue_reset';

    async hardReset(host: LifecycleHost): Promise<void> {
        const queue = host.singletons.taskQueue;
        if (!(queue instanceof DurableTaskQueue)) {
            host.logger.info('No durable task queue, nothing to purge');
            return;
        }
        const purged = await queue.store.purge();
        host.logger.info(`Purged ${purged} task(s)`);
    }

    async softReset(host: LifecycleHost): Promise<void> {
        const queue = host.singletons.taskQueue;
        if (!(queue instanceof DurableTaskQueue)) {
            host.logger.info('No durable task queue, nothing to recover');
            return;
        }
        const recovered = await queue.store.recover();
        host.logger.info(`Requeued ${recovered} stale task(s)`);
    }
}
