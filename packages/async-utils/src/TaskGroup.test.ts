import { describe, it, expect } from 'vitest';
import { fanOut, TaskGroup, describeError } from './TaskGroup.js';

describe('fanOut', () => {
    it('should launch every task before awaiting any', async () => {
        const started: string[] = [];
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            release = resolve;
        });

        const pending = fanOut(['a', 'b', 'c'], async key => {
            started.push(key);
            await gate;
            return key.toUpperCase();
        });

        expect(started).to.deep.equal(['a', 'b', 'c']);
        release();
        const report = await pending;
        expect(report.fulfilled.map(r => r.value)).to.deep.equal(['A', 'B', 'C']);
        expect(report.rejected).to.have.length(0);
    });

    it('should isolate a failing task from its siblings', async () => {
        const report = await fanOut([1, 2, 3], n => {
            if (n === 2) {
                throw new Error('boom');
            }
            return n * 10;
        });

        expect(report.fulfilled.map(r => r.value)).to.deep.equal([10, 30]);
        expect(report.rejected).to.have.length(1);
        expect(report.rejected[0].key).to.equal(2);
        expect(report.rejected[0].index).to.equal(1);
        expect(describeError(report.rejected[0].error)).to.equal('boom');
        expect(report.results.map(r => r.status)).to.deep.equal(['fulfilled', 'rejected', 'fulfilled']);
    });

    it('should resolve an empty batch immediately', async () => {
        const report = await fanOut([], async () => 1);
        expect(report.results).to.deep.equal([]);
    });
});

describe('TaskGroup', () => {
    it('should wait for spawned tasks and empty itself', async () => {
        const group = new TaskGroup<string>();
        group.spawn('ok', async () => 'done');
        group.spawn('bad', async () => {
            throw new Error('nope');
        });
        expect(group.size).to.equal(2);

        const report = await group.wait();
        expect(report.fulfilled).to.deep.equal([{ key: 'ok', index: 0, value: 'done' }]);
        expect(report.rejected.map(r => r.key)).to.deep.equal(['bad']);
        expect(group.size).to.equal(0);
    });

    it('should render non-error rejection reasons', () => {
        expect(describeError('plain')).to.equal('plain');
        expect(describeError(42)).to.equal('42');
    });
});
