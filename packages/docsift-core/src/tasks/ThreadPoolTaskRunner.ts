import { randomUUID } from 'crypto';
import { BroadcastChannel } from 'worker_threads';
import { Piscina } from 'piscina';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import type { TaskRunner } from './TaskWorker.js';
import type { TaskEnvelope, TaskResult, WorkerContextDescriptor } from './types.js';
import { CLOSE_MESSAGE, closedThread } from './thread-messages.js';
import type { Input } from './worker-thread.js';

export interface ThreadPoolOptions {
    /** Pool size (default: 4) */
    maxThreads?: number;
    /** Worker module URL; defaults to the worker-thread module next to this file */
    filename?: string;
    /** Node options for the threads, e.g. a loader for TypeScript sources */
    execArgv?: string[];
    /** How long close() waits for the threads to stop their contexts (default: 5000) */
    closeTimeoutMs?: number;
    logger?: Logger;
}

// Under tsx the sources run as-is and the loader is inherited by the threads
const WORKER_MODULE = import.meta.url.endsWith('.ts') ? './worker-thread.ts' : './worker-thread.js';

function isTaskResult(value: unknown): value is TaskResult {
    if (typeof value !== 'object' || value === null) return false;
    const status: unknown = Reflect.get(value, 'status');
    const message: unknown = Reflect.get(value, 'message');
    return (status === 'success' || status === 'error') && typeof message === 'string';
}

/**
 * Runs each envelope on a piscina thread. The descriptor travels with every
 * task; each thread builds and keeps its own WorkerContext from it, and
 * stops those contexts when the pool closes.
 */
export class ThreadPoolTaskRunner implements TaskRunner {
    private piscina: Piscina;
    private readonly pool = `docsift-pool-${randomUUID()}`;
    /** Threads that have built a context for this pool */
    private readonly threads = new Set<number>();
    private readonly closeTimeoutMs: number;
    private readonly logger: Logger;

    constructor(
        private readonly descriptor: WorkerContextDescriptor,
        options: ThreadPoolOptions = {}
    ) {
        const maxThreads = options.maxThreads || 4;
        this.logger = options.logger ?? new ConsoleLogger('ThreadPool');
        this.closeTimeoutMs = options.closeTimeoutMs ?? 5000;
        this.piscina = new Piscina({
            maxThreads,
            filename: options.filename ?? new URL(WORKER_MODULE, import.meta.url).href,
            ...(options.execArgv ? { execArgv: options.execArgv } : {}),
        });
        this.logger.info(`Worker pool initialized with ${maxThreads} threads`);
    }

    async run(envelope: TaskEnvelope): Promise<TaskResult> {
        const input: Input = { pool: this.pool, descriptor: this.descriptor, envelope };
        const output: unknown = await this.piscina.run(input);
        const threadId: unknown = typeof output === 'object' && output !== null ? Reflect.get(output, 'threadId') : null;
        const result: unknown = typeof output === 'object' && output !== null ? Reflect.get(output, 'result') : null;
        if (typeof threadId === 'number') {
            this.threads.add(threadId);
        }
        if (!isTaskResult(result)) {
            return { status: 'error', message: `Worker thread returned an invalid result for task ${envelope.id}` };
        }
        return result;
    }

    async close(): Promise<void> {
        if (this.threads.size > 0) {
            const closed = await this.closeContexts();
            this.logger.info(`Closed worker contexts on ${closed}/${this.threads.size} thread(s)`);
        }
        await this.piscina.destroy();
    }

    /**
     * Ask every thread to stop its contexts and wait for the acknowledgements,
     * at most `closeTimeoutMs`. Resolves to the number of threads that answered.
     */
    private closeContexts(): Promise<number> {
        const pending = new Set(this.threads);
        const channel = new BroadcastChannel(this.pool);
        return new Promise<number>(resolve => {
            const finish = () => {
                clearTimeout(timer);
                channel.close();
                resolve(this.threads.size - pending.size);
            };
            const timer = setTimeout(() => {
                this.logger.warn(`${pending.size} thread(s) did not close their contexts in ${this.closeTimeoutMs}ms`);
                finish();
            }, this.closeTimeoutMs);
            channel.onmessage = (message: unknown) => {
                const threadId = closedThread(message);
                if (threadId !== null && pending.delete(threadId) && pending.size === 0) {
                    finish();
                }
            };
            channel.postMessage(CLOSE_MESSAGE);
        });
    }
}
