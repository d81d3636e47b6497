import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { ResourceUnavailableError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import type { TaskEnvelope, TaskExecutionMode, TaskExecutor, TaskQueue, TaskRequest, TaskResult } from './types.js';

export interface TaskCompletedEvent {
    envelope: TaskEnvelope;
    result: TaskResult;
}

/**
 * Runs each unit inline before `schedule` resolves. Nothing is persisted:
 * a unit in flight when the process dies is lost.
 */
export class ImmediateTaskQueue extends EventEmitter implements TaskQueue {
    readonly mode: TaskExecutionMode = 'immediate';
    private executor: TaskExecutor | null = null;

    constructor(private readonly logger: Logger = new ConsoleLogger('ImmediateTaskQueue')) {
        super();
    }

    bind(executor: TaskExecutor): void {
        this.executor = executor;
    }

    async schedule(request: TaskRequest): Promise<string> {
        if (!this.executor) {
            throw new ResourceUnavailableError('task-executor', 'Immediate task queue has no executor bound');
        }
        const envelope: TaskEnvelope = {
            ...request,
            id: `sync-${randomUUID()}`,
            attempts: 0,
            enqueuedAt: new Date().toISOString(),
        };

        const result = await this.executor.execute(envelope);
        if (result.status === 'error') {
            this.logger.warn(`Task ${envelope.id} (${envelope.name}) failed: ${result.message}`);
        } else {
            this.logger.debug(`Task ${envelope.id} (${envelope.name}): ${result.message}`);
        }
        const event: TaskCompletedEvent = { envelope, result };
        this.emit('task:completed', event);
        return envelope.id;
    }

    async close(): Promise<void> {
        this.executor = null;
    }
}
