import { describe, it, expect } from 'vitest';
import { Metadata } from '@docsift/content-model';
import { TaskExecutionError } from '../errors.js';
import { MemoryKVClient } from '../kv/MemoryKVClient.js';
import { MemoryLogger } from '../logging/Logger.js';
import { DurableTaskQueue } from './DurableTaskQueue.js';
import { ImmediateTaskQueue, type TaskCompletedEvent } from './ImmediateTaskQueue.js';
import { KVQueueStore } from './QueueStore.js';
import { InProcessTaskRunner, TaskWorker, type TaskProcessedEvent } from './TaskWorker.js';
import {
    cleanupCacheTask,
    extractContentTask,
    fetchContentTask,
    parseTaskEnvelope,
    type TaskEnvelope,
    type TaskExecutor,
    type TaskResult,
} from './types.js';

class ScriptedExecutor implements TaskExecutor {
    readonly seen: TaskEnvelope[] = [];

    constructor(private readonly outcome: (envelope: TaskEnvelope) => TaskResult) {}

    async execute(envelope: TaskEnvelope): Promise<TaskResult> {
        this.seen.push(envelope);
        return this.outcome(envelope);
    }
}

function store(client = new MemoryKVClient()): KVQueueStore {
    return new KVQueueStore(client, { name: 'test', logger: new MemoryLogger() });
}

describe('task requests', () => {
    it('should encode metadata and content as plain JSON', () => {
        const metadata = new Metadata({ sourceUrl: 'file:///a.txt' });
        expect(fetchContentTask('file:///a.txt')).to.deep.equal({
            name: 'fetch_content',
            payload: { url: 'file:///a.txt', metadata: null },
        });
        expect(extractContentTask(new Uint8Array([104, 105]), metadata).payload).to.deep.equal({
            content: { encoding: 'base64', data: 'aGk=' },
            metadata: { sourceUrl: 'file:///a.txt', processingState: 'pending', tags: [], extra: {} },
        });
        expect(cleanupCacheTask(['x']).payload).to.deep.equal({ cacheIds: ['x'] });
    });

    it('should validate stored envelopes', () => {
        const envelope = parseTaskEnvelope({ id: 't1', name: 'cleanup_cache', payload: { cacheIds: ['a'] } });
        expect(envelope).to.deep.equal({
            id: 't1',
            name: 'cleanup_cache',
            payload: { cacheIds: ['a'] },
            attempts: 0,
            enqueuedAt: '1970-01-01T00:00:00.000Z',
        });

        expect(() => parseTaskEnvelope({ id: 't2', name: 'explode', payload: {} })).to.throw(
            TaskExecutionError,
            'Unknown task name: explode'
        );
        expect(() => parseTaskEnvelope({ id: 't3', name: 'fetch_content', payload: { url: 5 } })).to.throw(
            'Invalid fetch_content payload'
        );
        expect(() => parseTaskEnvelope('nope')).to.throw('Task envelope must be an object');
    });
});

describe('ImmediateTaskQueue', () => {
    it('should run the unit before schedule resolves', async () => {
        const logger = new MemoryLogger();
        const queue = new ImmediateTaskQueue(logger);
        const executor = new ScriptedExecutor(() => ({ status: 'error', message: 'bad input' }));
        const completed: TaskCompletedEvent[] = [];
        queue.on('task:completed', (event: TaskCompletedEvent) => completed.push(event));
        queue.bind(executor);

        const id = await queue.schedule(cleanupCacheTask(['a']));

        expect(id.startsWith('sync-')).to.be.true;
        expect(executor.seen.map(e => e.id)).to.deep.equal([id]);
        expect(completed[0].result).to.deep.equal({ status: 'error', message: 'bad input' });
        expect(logger.messages('warn')).to.deep.equal([`Task ${id} (cleanup_cache) failed: bad input`]);
    });

    it('should refuse to schedule without an executor', async () => {
        const queue = new ImmediateTaskQueue(new MemoryLogger());
        await expect(queue.schedule(cleanupCacheTask([]))).rejects.toThrow(
            'Immediate task queue has no executor bound'
        );
    });
});

describe('KVQueueStore', () => {
    it('should claim in FIFO order and ack', async () => {
        const queueStore = store();
        const queue = new DurableTaskQueue(queueStore);
        const first = await queue.schedule(cleanupCacheTask(['1']));
        await queue.schedule(cleanupCacheTask(['2']));

        const claimed = await queueStore.claim();
        expect(claimed?.envelope.id).to.equal(first);
        expect(await queueStore.stats()).to.deep.equal({ pending: 1, processing: 1, failed: 0 });

        if (claimed) await queueStore.ack(claimed);
        expect(await queueStore.stats()).to.deep.equal({ pending: 1, processing: 0, failed: 0 });
    });

    it('should requeue with an attempt count, then dead-letter', async () => {
        const queueStore = store();
        await new DurableTaskQueue(queueStore).schedule(cleanupCacheTask(['x']));

        const firstClaim = await queueStore.claim();
        expect(firstClaim).to.not.equal(null);
        if (!firstClaim) return;
        expect(await queueStore.release(firstClaim, 'boom', 2)).to.equal('retried');

        const secondClaim = await queueStore.claim();
        expect(secondClaim?.envelope.attempts).to.equal(1);
        expect(secondClaim?.envelope.lastError).to.equal('boom');
        if (!secondClaim) return;
        expect(await queueStore.release(secondClaim, 'boom again', 2)).to.equal('dead-lettered');

        expect(await queueStore.stats()).to.deep.equal({ pending: 0, processing: 0, failed: 1 });
        const [dead] = await queueStore.deadLetters();
        expect(dead.attempts).to.equal(2);
        expect(dead.lastError).to.equal('boom again');
    });

    it('should dead-letter undecodable entries while claiming', async () => {
        const client = new MemoryKVClient();
        const queueStore = store(client);
        await client.rpush('queue:test:pending', '{not json');
        await new DurableTaskQueue(queueStore).schedule(cleanupCacheTask(['ok']));

        const claimed = await queueStore.claim();
        expect(claimed?.envelope.payload).to.deep.equal({ cacheIds: ['ok'] });
        expect(await client.lrange('queue:test:failed', 0, -1)).to.deep.equal(['{not json']);
    });

    it('should recover stale claims and purge everything', async () => {
        const queueStore = store();
        const queue = new DurableTaskQueue(queueStore);
        await queue.schedule(cleanupCacheTask(['a']));
        await queue.schedule(cleanupCacheTask(['b']));
        await queueStore.claim();

        expect(await queueStore.recover()).to.equal(1);
        expect(await queueStore.stats()).to.deep.equal({ pending: 2, processing: 0, failed: 0 });
        expect(await queueStore.purge()).to.equal(2);
        expect(await queueStore.stats()).to.deep.equal({ pending: 0, processing: 0, failed: 0 });
    });
});

describe('TaskWorker', () => {
    it('should acknowledge successful units', async () => {
        const queueStore = store();
        const queue = new DurableTaskQueue(queueStore);
        await queue.schedule(cleanupCacheTask(['a']));
        await queue.schedule(cleanupCacheTask(['b']));
        const executor = new ScriptedExecutor(() => ({ status: 'success', message: 'ok' }));
        const worker = new TaskWorker(queueStore, new InProcessTaskRunner(executor), new MemoryLogger());

        expect(await worker.drain()).to.equal(2);
        expect(executor.seen.map(e => e.payload)).to.deep.equal([{ cacheIds: ['a'] }, { cacheIds: ['b'] }]);
        expect(await queueStore.stats()).to.deep.equal({ pending: 0, processing: 0, failed: 0 });
    });

    it('should retry a failing unit until it is dead-lettered', async () => {
        const queueStore = store();
        await new DurableTaskQueue(queueStore).schedule(cleanupCacheTask(['a']));
        const executor = new ScriptedExecutor(() => {
            throw new Error('executor crashed');
        });
        const worker = new TaskWorker(queueStore, new InProcessTaskRunner(executor), new MemoryLogger(), {
            maxAttempts: 3,
        });
        const failures: TaskProcessedEvent[] = [];
        worker.on('task:failed', (event: TaskProcessedEvent) => failures.push(event));

        let processed = 0;
        for (let round = 0; round < 5; round++) {
            processed += await worker.drain();
        }

        expect(processed).to.equal(3);
        expect(failures.map(f => f.outcome)).to.deep.equal(['retried', 'retried', 'dead-lettered']);
        expect(failures[2].result).to.deep.equal({ status: 'error', message: 'executor crashed' });
        expect(await queueStore.stats()).to.deep.equal({ pending: 0, processing: 0, failed: 1 });
    });

    it('should poll until stopped', async () => {
        const queueStore = store();
        const executor = new ScriptedExecutor(() => ({ status: 'success', message: 'ok' }));
        const worker = new TaskWorker(queueStore, new InProcessTaskRunner(executor), new MemoryLogger(), {
            pollIntervalMs: 10,
        });
        const done = new Promise<TaskProcessedEvent>(resolve => worker.once('task:completed', resolve));

        worker.start();
        await new DurableTaskQueue(queueStore).schedule(cleanupCacheTask(['late']));
        const event = await done;
        await worker.stop();

        expect(event.envelope.payload).to.deep.equal({ cacheIds: ['late'] });
        expect(worker.isRunning()).to.be.false;
    });
});
