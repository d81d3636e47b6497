import { BroadcastChannel, threadId } from 'worker_threads';
import { describeError } from '@docsift/async-utils';
import { ConsoleLogger } from '../logging/Logger.js';
import { createWorkerContext, type WorkerContext } from '../startup/Application.js';
import { PipelineTaskExecutor } from './PipelineTaskExecutor.js';
import { CLOSE_MESSAGE, messageData } from './thread-messages.js';
import { parseTaskEnvelope, type TaskEnvelope, type TaskResult, type WorkerContextDescriptor } from './types.js';

export interface Input {
    /** Broadcast channel of the pool that sent the task */
    pool: string;
    descriptor: WorkerContextDescriptor;
    envelope: TaskEnvelope;
}

export interface Output {
    threadId: number;
    result: TaskResult;
}

interface CachedExecutor {
    context: WorkerContext;
    executor: PipelineTaskExecutor;
}

interface PoolContexts {
    channel: BroadcastChannel;
    /** One executor per descriptor, built the first time this thread sees it */
    executors: Map<string, Promise<CachedExecutor>>;
}

const logger = new ConsoleLogger(`worker-thread-${threadId}`);
const pools = new Map<string, PoolContexts>();

function contextsOf(pool: string): PoolContexts {
    let contexts = pools.get(pool);
    if (!contexts) {
        const channel = new BroadcastChannel(pool);
        channel.unref();
        channel.onmessage = (message: unknown) => {
            if (messageData(message) !== CLOSE_MESSAGE) return;
            closePool(pool).catch((error: unknown) => {
                logger.error(`Failed to close worker contexts: ${describeError(error)}`);
            });
        };
        contexts = { channel, executors: new Map() };
        pools.set(pool, contexts);
    }
    return contexts;
}

/**
 * Stop every context this thread built for `pool`, then acknowledge with
 * the thread id.
 */
async function closePool(pool: string): Promise<void> {
    const contexts = pools.get(pool);
    if (!contexts) return;
    pools.delete(pool);

    const built = await Promise.allSettled(contexts.executors.values());
    for (const entry of built) {
        if (entry.status === 'fulfilled') {
            await entry.value.context.application.stop();
        }
    }
    logger.debug(`Closed ${built.length} worker context(s)`);
    contexts.channel.postMessage({ closed: threadId });
    contexts.channel.close();
}

function executorFor(pool: string, descriptor: WorkerContextDescriptor): Promise<CachedExecutor> {
    const { executors } = contextsOf(pool);
    const key = JSON.stringify(descriptor);
    let executor = executors.get(key);
    if (!executor) {
        executor = createWorkerContext({
            workerId: `thread-${threadId}`,
            profile: descriptor.profile,
            userConfig: descriptor.userConfig,
            paths: descriptor.paths,
        }).then(context => ({ context, executor: new PipelineTaskExecutor(context.singletons) }));
        executors.set(key, executor);
        // A failed build is retried on the next task
        void executor.catch(() => executors.delete(key));
    }
    return executor;
}

export default async function runTask({ pool, descriptor, envelope }: Input): Promise<Output> {
    const { executor } = await executorFor(pool, descriptor);
    return { threadId, result: await executor.execute(parseTaskEnvelope(envelope)) };
}
