import { describe, it, expect } from 'vitest';
import { Metadata } from '@docsift/content-model';
import { Configuration } from '../../config/Configuration.js';
import { MemoryKVClient } from '../../kv/MemoryKVClient.js';
import { MemoryLogger } from '../../logging/Logger.js';
import { HostFactory } from '../../plugin-engine/hosts.js';
import { PluginRegistry } from '../../plugin-engine/PluginRegistry.js';
import type { Singletons } from '../../plugin-engine/types.js';
import { MemoryCacheManager } from '../../storage/CacheManager.js';
import { MemoryDataStorage } from '../../storage/DataStorage.js';
import { MemoryStateStorage } from '../../storage/StateStorage.js';
import { DurableTaskQueue } from '../../tasks/DurableTaskQueue.js';
import { ImmediateTaskQueue } from '../../tasks/ImmediateTaskQueue.js';
import { KVQueueStore } from '../../tasks/QueueStore.js';
import type { TaskQueue } from '../../tasks/types.js';
import { cleanupCacheTask } from '../../tasks/types.js';
import { StorageResetAction, TaskQueueResetAction } from './ResetActions.js';

function setup(taskQueue: TaskQueue | null) {
    const logger = new MemoryLogger();
    const singletons: Singletons = {
        logger,
        configuration: new Configuration({}),
        stateStorage: new MemoryStateStorage(),
        cache: new MemoryCacheManager(),
        dataStorage: new MemoryDataStorage(),
        registry: new PluginRegistry(logger),
        taskQueue,
    };
    const hosts = new HostFactory(singletons);
    return { logger, singletons, hosts };
}

async function durableQueueWithClaim(logger = new MemoryLogger()) {
    const store = new KVQueueStore(new MemoryKVClient(), { name: 'reset', logger });
    const queue = new DurableTaskQueue(store);
    await queue.schedule(cleanupCacheTask(['a']));
    await queue.schedule(cleanupCacheTask(['b']));
    await store.claim();
    return { store, queue };
}

describe('StorageResetAction', () => {
    it('should clear only the cache on a soft reset', async () => {
        const { singletons, hosts } = setup(null);
        const host = hosts.createLifecycleHost('storage_reset');
        const cacheId = await singletons.cache.save('fetcher', 'body');
        await singletons.dataStorage.addItem(host, 'kept', new Metadata({ sourceUrl: 'file:///kept.txt' }));

        await new StorageResetAction().softReset(host);

        expect(await singletons.cache.get(cacheId)).to.equal(null);
        expect(await singletons.dataStorage.findItem('item_1')).to.not.equal(null);
    });

    it('should clear every backend on a hard reset', async () => {
        const { singletons, hosts, logger } = setup(null);
        const host = hosts.createLifecycleHost('storage_reset');
        await singletons.cache.save('fetcher', 'body');
        await singletons.dataStorage.addItem(host, 'gone', new Metadata({ sourceUrl: 'file:///gone.txt' }));
        await host.state.store('cursor', 3);

        await new StorageResetAction().hardReset(host);

        expect(await singletons.cache.getAll('fetcher')).to.deep.equal([]);
        expect(await singletons.dataStorage.findItem('item_1')).to.equal(null);
        expect(await host.state.get('cursor', null)).to.equal(null);
        expect(logger.messages('info')).to.deep.equal(['Cleared cache, data storage and state storage']);
    });
});

describe('TaskQueueResetAction', () => {
    it('should requeue claimed units on a soft reset', async () => {
        const { store, queue } = await durableQueueWithClaim();
        const { hosts, logger } = setup(queue);

        await new TaskQueueResetAction().softReset(hosts.createLifecycleHost('task_queue_reset'));

        expect(await store.stats()).to.deep.equal({ pending: 2, processing: 0, failed: 0 });
        expect(logger.messages('info')).to.deep.equal(['Requeued 1 stale task(s)']);
    });

    it('should drop every unit on a hard reset', async () => {
        const { store, queue } = await durableQueueWithClaim();
        const { hosts, logger } = setup(queue);

        await new TaskQueueResetAction().hardReset(hosts.createLifecycleHost('task_queue_reset'));

        expect(await store.stats()).to.deep.equal({ pending: 0, processing: 0, failed: 0 });
        expect(logger.messages('info')).to.deep.equal(['Purged 2 task(s)']);
    });

    it('should skip queues that keep nothing', async () => {
        const { hosts, logger } = setup(new ImmediateTaskQueue(new MemoryLogger()));
        const action = new TaskQueueResetAction();
        const host = hosts.createLifecycleHost('task_queue_reset');

        await action.hardReset(host);
        await action.softReset(host);

        expect(logger.messages('info')).to.deep.equal([
            'No durable task queue, nothing to purge',
            'No durable task queue, nothing to recover',
        ]);
    });
});
