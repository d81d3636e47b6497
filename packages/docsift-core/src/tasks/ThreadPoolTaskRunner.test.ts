import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { MemoryLogger } from '../logging/Logger.js';
import { closedThread, messageData } from './thread-messages.js';
import { ThreadPoolTaskRunner } from './ThreadPoolTaskRunner.js';
import {
    cleanupCacheTask,
    fetchContentTask,
    type TaskEnvelope,
    type TaskRequest,
    type TaskResult,
} from './types.js';

function envelope(request: TaskRequest, id: string): TaskEnvelope {
    return { ...request, id, attempts: 0, enqueuedAt: new Date(0).toISOString() };
}

describe('ThreadPoolTaskRunner', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsift-threads-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('should run units on a thread and stop its contexts on close', async () => {
        const file = path.join(dir, 'note.txt');
        await fs.writeFile(file, 'Threaded');
        const url = pathToFileURL(file).href;
        const logger = new MemoryLogger();
        const runner = new ThreadPoolTaskRunner(
            { profile: 'test' },
            { maxThreads: 1, execArgv: ['--import', 'tsx'], logger }
        );

        const results: TaskResult[] = [];
        try {
            results.push(await runner.run(envelope(fetchContentTask(url), 'task-1')));
            results.push(await runner.run(envelope(cleanupCacheTask([]), 'task-2')));
        } finally {
            await runner.close();
        }

        expect(results).to.deep.equal([
            { status: 'success', message: `Fetched ${url} with file_fetcher` },
            { status: 'success', message: 'Cleaned up 0 cache entries' },
        ]);
        expect(logger.messages('info')).to.deep.equal([
            'Worker pool initialized with 1 threads',
            'Closed worker contexts on 1/1 thread(s)',
        ]);
        expect(logger.messages('warn')).to.deep.equal([]);
    }, 60000);

    it('should close without asking threads that never ran a unit', async () => {
        const logger = new MemoryLogger();
        const runner = new ThreadPoolTaskRunner(
            { profile: 'test' },
            { maxThreads: 1, execArgv: ['--import', 'tsx'], logger }
        );

        await runner.close();

        expect(logger.messages('info')).to.deep.equal(['Worker pool initialized with 1 threads']);
    });
});

describe('thread messages', () => {
    it('should read the thread id of a close acknowledgement', () => {
        expect(closedThread({ data: { closed: 3 } })).to.equal(3);
        expect(closedThread({ data: 'close-contexts' })).to.equal(null);
        expect(closedThread(null)).to.equal(null);
        expect(messageData({ data: 'x' })).to.equal('x');
    });
});
