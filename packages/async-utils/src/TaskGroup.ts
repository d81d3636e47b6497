/**
 * Fan-out / fan-in helpers.
 *
 * A batch of operations is launched together and awaited together.
 * Failures are collected per operation and never cancel the siblings.
 */

export type SettledTask<K, T> =
    | { key: K; index: number; status: 'fulfilled'; value: T }
    | { key: K; index: number; status: 'rejected'; error: unknown };

export interface FanOutReport<K, T> {
    /** Outcomes in launch order */
    results: SettledTask<K, T>[];
    fulfilled: Array<{ key: K; index: number; value: T }>;
    rejected: Array<{ key: K; index: number; error: unknown }>;
}

/**
 * Run `task` for every key concurrently and wait for all of them.
 * Synchronous throws are reported the same way as rejections.
 */
export async function fanOut<K, T>(
    keys: readonly K[],
    task: (key: K, index: number) => Promise<T> | T
): Promise<FanOutReport<K, T>> {
    const launched = keys.map((key, index) => (async () => task(key, index))());
    const settled = await Promise.allSettled(launched);

    const report: FanOutReport<K, T> = { results: [], fulfilled: [], rejected: [] };
    settled.forEach((outcome, index) => {
        const key = keys[index];
        if (outcome.status === 'fulfilled') {
            report.results.push({ key, index, status: 'fulfilled', value: outcome.value });
            report.fulfilled.push({ key, index, value: outcome.value });
        } else {
            report.results.push({ key, index, status: 'rejected', error: outcome.reason });
            report.rejected.push({ key, index, error: outcome.reason });
        }
    });
    return report;
}

/**
 * Collects tasks launched at different moments and awaits them as one batch.
 * Each task's outcome is captured as soon as it settles, so a task that fails
 * before `wait()` is called is still reported rather than left unhandled.
 */
export class TaskGroup<K = string> {
    private readonly pending: Array<Promise<SettledTask<K, unknown>>> = [];

    /** Launch a task immediately and track it under `key` */
    spawn(key: K, task: () => Promise<unknown> | unknown): void {
        const index = this.pending.length;
        this.pending.push(
            (async () => task())().then(
                (value): SettledTask<K, unknown> => ({ key, index, status: 'fulfilled', value }),
                (error: unknown): SettledTask<K, unknown> => ({ key, index, status: 'rejected', error })
            )
        );
    }

    get size(): number {
        return this.pending.length;
    }

    /**
     * Wait for every spawned task. The group is emptied so it can be reused.
     */
    async wait(): Promise<FanOutReport<K, unknown>> {
        const results = await Promise.all(this.pending.splice(0, this.pending.length));
        const report: FanOutReport<K, unknown> = { results, fulfilled: [], rejected: [] };
        for (const result of results) {
            if (result.status === 'fulfilled') {
                report.fulfilled.push({ key: result.key, index: result.index, value: result.value });
            } else {
                report.rejected.push({ key: result.key, index: result.index, error: result.error });
            }
        }
        return report;
    }
}

/**
 * Render an unknown rejection reason for logs.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
