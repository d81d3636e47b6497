import { describe, it, expect, beforeEach } from 'vitest';
import { Configuration } from '../config/Configuration.js';
import { MemoryKVClient } from '../kv/MemoryKVClient.js';
import { MemoryLogger } from '../logging/Logger.js';
import { PluginRegistry } from '../plugin-engine/PluginRegistry.js';
import type { Singletons } from '../plugin-engine/types.js';
import { MemoryCacheManager } from '../storage/CacheManager.js';
import { KVDataStorage, MemoryDataStorage } from '../storage/DataStorage.js';
import { MemoryStateStorage } from '../storage/StateStorage.js';
import { DurableTaskQueue } from '../tasks/DurableTaskQueue.js';
import { ImmediateTaskQueue } from '../tasks/ImmediateTaskQueue.js';
import { KVQueueStore } from '../tasks/QueueStore.js';
import { cleanupCacheTask } from '../tasks/types.js';
import { formatHealthReport, SystemHealthMonitor, type SystemHealthReport } from './HealthMonitor.js';

const NOW = new Date('2026-01-02T03:04:05.000Z');

describe('SystemHealthMonitor', () => {
    let logger: MemoryLogger;
    let monitor: SystemHealthMonitor;

    function singletons(overrides: Partial<Singletons> = {}): Singletons {
        return {
            logger,
            configuration: new Configuration({ app: { name: 'test' } }),
            stateStorage: new MemoryStateStorage(),
            cache: new MemoryCacheManager(),
            dataStorage: new MemoryDataStorage(),
            registry: new PluginRegistry(logger),
            taskQueue: new ImmediateTaskQueue(logger),
            ...overrides,
        };
    }

    beforeEach(() => {
        logger = new MemoryLogger();
        monitor = new SystemHealthMonitor(logger, () => NOW);
    });

    it('should report every component healthy on in-memory backends', async () => {
        const report = await monitor.checkSystemHealth(singletons());

        expect(report.status).to.equal('healthy');
        expect(report.timestamp).to.equal('2026-01-02T03:04:05.000Z');
        expect(Object.keys(report.components)).to.deep.equal([
            'configuration',
            'plugins',
            'task_queue',
            'cache',
            'state_storage',
            'data_storage',
        ]);
        expect(report.components.configuration).to.deep.equal({ status: 'healthy', details: { keys: 1 } });
        expect(report.components.task_queue).to.deep.equal({
            status: 'healthy',
            details: { mode: 'immediate', type: 'ImmediateTaskQueue' },
        });
        expect(report.metrics).to.deep.equal({ total_registrations: 0 });
        expect(report.errors).to.deep.equal([]);
        expect(logger.messages('warn')).to.deep.equal([]);
    });

    it('should count registrations per extension point', async () => {
        const registry = new PluginRegistry(logger);
        registry.register('CacheProvider', { createCache: () => new MemoryCacheManager() });

        const report = await monitor.checkSystemHealth(singletons({ registry }));

        expect(report.components.plugins.details.CacheProvider).to.equal(1);
        expect(report.components.plugins.details.ContentSource).to.equal(0);
        expect(report.metrics.total_registrations).to.equal(1);
    });

    it('should degrade when scheduling is synchronous', async () => {
        const report = await monitor.checkSystemHealth(singletons({ taskQueue: null }));

        expect(report.status).to.equal('degraded');
        expect(report.components.task_queue).to.deep.equal({ status: 'disabled', details: { mode: 'synchronous' } });
        expect(logger.messages('warn')).to.deep.equal(['System health is degraded']);
    });

    it('should degrade when the durable queue holds dead letters', async () => {
        const store = new KVQueueStore(new MemoryKVClient(), { name: 'test', logger });
        const queue = new DurableTaskQueue(store);
        await queue.schedule(cleanupCacheTask(['x']));
        const claimed = await store.claim();
        expect(claimed).to.not.equal(null);
        if (!claimed) return;
        expect(await store.release(claimed, 'boom', 1)).to.equal('dead-lettered');

        const report = await monitor.checkSystemHealth(singletons({ taskQueue: queue }));

        expect(report.status).to.equal('degraded');
        expect(report.components.task_queue).to.deep.equal({
            status: 'degraded',
            details: { mode: 'durable', type: 'DurableTaskQueue', pending: 0, processing: 0, failed: 1 },
        });
    });

    it('should mark a backend that does not answer as unhealthy', async () => {
        const client = new MemoryKVClient();
        await client.close();

        const report = await monitor.checkSystemHealth(singletons({ dataStorage: new KVDataStorage(client) }));

        expect(report.status).to.equal('unhealthy');
        expect(report.components.data_storage).to.deep.equal({
            status: 'unhealthy',
            details: { type: 'KVDataStorage', error: 'no answer from the backend' },
        });
        expect(report.errors).to.deep.equal([]);
        expect(logger.messages('warn')).to.deep.equal(['System health is unhealthy']);
    });

    it('should record a check that throws and carry on', async () => {
        const cache = Object.assign(new MemoryCacheManager(), {
            health: async (): Promise<boolean> => {
                throw new Error('disk gone');
            },
        });

        const report = await monitor.checkSystemHealth(singletons({ cache }));

        expect(report.status).to.equal('unhealthy');
        expect(report.components.cache).to.deep.equal({ status: 'unhealthy', details: { error: 'disk gone' } });
        expect(report.components.data_storage.status).to.equal('healthy');
        expect(report.errors).to.deep.equal(['cache check failed: disk gone']);
        expect(logger.messages('error')).to.deep.equal(['Health check of cache failed: disk gone']);
    });
});

describe('formatHealthReport', () => {
    const report: SystemHealthReport = {
        status: 'unhealthy',
        timestamp: '2026-01-02T03:04:05.000Z',
        components: {
            task_queue: { status: 'disabled', details: { mode: 'synchronous' } },
            cache: { status: 'unhealthy', details: { error: 'disk gone' } },
        },
        metrics: { total_registrations: 3 },
        errors: ['cache check failed: disk gone'],
    };

    it('should render the text form', () => {
        expect(formatHealthReport(report).split('\n')).to.deep.equal([
            'docsift system health',
            'Status: UNHEALTHY',
            'Timestamp: 2026-01-02T03:04:05.000Z',
            '',
            'ERRORS:',
            '  - cache check failed: disk gone',
            '',
            'COMPONENTS:',
            '  task_queue: DISABLED',
            '    mode: synchronous',
            '  cache: UNHEALTHY',
            '    error: disk gone',
            '',
            'METRICS:',
            '  total_registrations: 3',
        ]);
    });

    it('should render JSON that parses back to the report', () => {
        expect(JSON.parse(formatHealthReport(report, 'json'))).to.deep.equal(report);
    });
});
