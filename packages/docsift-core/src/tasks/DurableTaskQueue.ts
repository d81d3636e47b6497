import { randomUUID } from 'crypto';
import type { QueueStore } from './QueueStore.js';
import type { TaskEnvelope, TaskExecutionMode, TaskQueue, TaskRequest } from './types.js';

/**
 * Persists each unit into a QueueStore; a TaskWorker executes it later.
 */
export class DurableTaskQueue implements TaskQueue {
    readonly mode: TaskExecutionMode = 'durable';

    constructor(readonly store: QueueStore) {}

    async schedule(request: TaskRequest): Promise<string> {
        const envelope: TaskEnvelope = {
            ...request,
            id: randomUUID(),
            attempts: 0,
            enqueuedAt: new Date().toISOString(),
        };
        await this.store.push(envelope);
        return envelope.id;
    }

    health(): Promise<boolean> {
        return this.store.health();
    }

    async close(): Promise<void> {
        await this.store.close();
    }
}
