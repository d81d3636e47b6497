import type { Configuration } from '../../config/Configuration.js';
import type { TaskExecutionProvider } from '../../plugin-engine/types.js';
import { DurableTaskQueue } from '../../tasks/DurableTaskQueue.js';
import { ImmediateTaskQueue } from '../../tasks/ImmediateTaskQueue.js';
import { KVQueueStore } from '../../tasks/QueueStore.js';
import type { TaskQueue } from '../../tasks/types.js';
import { connectRedis, type KVClientFactory } from './redis.js';

export class ImmediateTaskExecutionProvider implements TaskExecutionProvider {
    readonly providerId = 'immediate';

    createTaskQueue(): TaskQueue {
        return new ImmediateTaskQueue();
    }
}

/**
 * Durable queue over a KV store; the queue name comes from `tasks.queue_name`.
 */
export class DurableTaskExecutionProvider implements TaskExecutionProvider {
    readonly providerId = 'durable';

    constructor(private readonly connect: KVClientFactory = connectRedis) {}

    async createTaskQueue(configuration: Configuration): Promise<TaskQueue> {
        const client = await this.connect(configuration);
        return new DurableTaskQueue(new KVQueueStore(client, { name: configuration.getString('tasks.queue_name', 'tasks') }));
    }
}

/**
 * Selects synchronous-only operation: nothing is scheduled.
 */
export class SynchronousTaskExecutionProvider implements TaskExecutionProvider {
    readonly providerId = 'synchronous';

    createTaskQueue(): null {
        return null;
    }
}
