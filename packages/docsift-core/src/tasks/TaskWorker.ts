/**
 * Task Worker
 *
 * Claims envelopes from a QueueStore and runs them through a TaskRunner with
 * bounded parallelism. A unit is acknowledged only after it succeeded; a
 * failed unit is retried until `maxAttempts`, then dead-lettered.
 */

import { EventEmitter } from 'events';
import PQueue from 'p-queue';
import { TaskGroup, describeError } from '@docsift/async-utils';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import type { ClaimedTask, QueueStore, ReleaseOutcome } from './QueueStore.js';
import type { TaskEnvelope, TaskExecutor, TaskResult } from './types.js';

// =============================================================================
// Runners
// =============================================================================

/**
 * Execution strategy for one claimed envelope.
 */
export interface TaskRunner {
    run(envelope: TaskEnvelope): Promise<TaskResult>;
    close(): Promise<void>;
}

// =============================================================================
// Configuration
// =============================================================================

export interface TaskWorkerConfig {
    /** Units run at once (default: 4) */
    concurrency?: number;
    /** Delay between polls of an empty queue in ms (default: 1000) */
    pollIntervalMs?: number;
    /** Attempts before a unit is dead-lettered (default: 3) */
    maxAttempts?: number;
}

const DEFAULT_CONFIG: Required<TaskWorkerConfig> = {
    concurrency: 4,
    pollIntervalMs: 1000,
    maxAttempts: 3,
};

export interface TaskProcessedEvent {
    envelope: TaskEnvelope;
    result: TaskResult;
    /** Set when the unit failed */
    outcome?: ReleaseOutcome;
}

// =============================================================================
// Task Worker
// =============================================================================

export class TaskWorker extends EventEmitter {
    private readonly config: Required<TaskWorkerConfig>;
    private readonly queue: PQueue;
    private running = false;
    private stopping = false;
    private loop: Promise<void> | null = null;
    private wake: (() => void) | null = null;

    constructor(
        private readonly store: QueueStore,
        private readonly runner: TaskRunner,
        private readonly logger: Logger = new ConsoleLogger('TaskWorker'),
        config: TaskWorkerConfig = {}
    ) {
        super();
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.queue = new PQueue({ concurrency: this.config.concurrency });
    }

    /**
     * Run claimed units until the store has nothing pending.
     * Returns the number of units processed.
     */
    async drain(): Promise<number> {
        const group = new TaskGroup<string>();
        let processed = 0;

        for (let claimed = await this.claimNext(); claimed; claimed = await this.claimNext()) {
            const task = claimed;
            processed++;
            group.spawn(task.envelope.id, () => this.queue.add(() => this.process(task)));
        }

        const report = await group.wait();
        for (const { key, error } of report.rejected) {
            this.logger.error(`Task ${key} could not be settled: ${describeError(error)}`);
        }
        return processed;
    }

    /**
     * Poll the store until `stop()` is called.
     */
    start(): void {
        if (this.running) return;
        this.running = true;
        this.loop = this.pollLoop();
        this.logger.info(
            `Worker started (concurrency=${this.config.concurrency}, maxAttempts=${this.config.maxAttempts})`
        );
    }

    async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;
        this.stopping = true;
        this.wake?.();
        await this.loop;
        this.loop = null;
        this.stopping = false;
        await this.runner.close();
        this.logger.info('Worker stopped');
    }

    isRunning(): boolean {
        return this.running;
    }

    private async claimNext(): Promise<ClaimedTask | null> {
        // Keep at most one claimed unit waiting for a free slot
        await this.queue.onSizeLessThan(1);
        return this.stopping ? null : this.store.claim();
    }

    private async pollLoop(): Promise<void> {
        while (this.running) {
            try {
                const processed = await this.drain();
                if (processed > 0) continue;
            } catch (error) {
                this.logger.error('Queue poll failed:', error);
            }
            await this.sleep(this.config.pollIntervalMs);
        }
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve();
            }, ms);
            this.wake = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
        });
    }

    private async process(claimed: ClaimedTask): Promise<TaskResult> {
        const { envelope } = claimed;
        let result: TaskResult;
        try {
            result = await this.runner.run(envelope);
        } catch (error) {
            result = { status: 'error', message: describeError(error) };
        }

        if (result.status === 'success') {
            await this.store.ack(claimed);
            this.logger.debug(`Task ${envelope.id} (${envelope.name}): ${result.message}`);
            const event: TaskProcessedEvent = { envelope, result };
            this.emit('task:completed', event);
            return result;
        }

        const outcome = await this.store.release(claimed, result.message, this.config.maxAttempts);
        this.logger.warn(
            `Task ${envelope.id} (${envelope.name}) failed on attempt ${envelope.attempts + 1}, ${outcome}: ${result.message}`
        );
        const event: TaskProcessedEvent = { envelope, result, outcome };
        this.emit('task:failed', event);
        return result;
    }
}

/**
 * Runs units on the calling thread through an executor built on the worker's own singletons.
 */
export class InProcessTaskRunner implements TaskRunner {
    constructor(private readonly executor: TaskExecutor) {}

    run(envelope: TaskEnvelope): Promise<TaskResult> {
        return this.executor.execute(envelope);
    }

    async close(): Promise<void> {}
}
