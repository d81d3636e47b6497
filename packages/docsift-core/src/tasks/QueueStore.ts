/**
 * Durable queue storage.
 *
 * Envelopes move pending → processing on claim and leave processing only when
 * acknowledged, requeued or dead-lettered, which gives at-least-once delivery.
 */

import { ConsoleLogger, type Logger } from '../logging/Logger.js';
import type { IKVClient } from '../kv/IKVClient.js';
import { parseTaskEnvelope, type TaskEnvelope } from './types.js';

export interface ClaimedTask {
    envelope: TaskEnvelope;
    /** Opaque token identifying the claimed entry in the processing list */
    receipt: string;
}

export interface QueueStats {
    pending: number;
    processing: number;
    failed: number;
}

export type ReleaseOutcome = 'retried' | 'dead-lettered';

export interface QueueStore {
    push(envelope: TaskEnvelope): Promise<void>;
    /** Move the oldest pending envelope to processing; null when none is pending */
    claim(): Promise<ClaimedTask | null>;
    ack(claimed: ClaimedTask): Promise<void>;
    /** Record a failed attempt: requeue, or dead-letter once `maxAttempts` is reached */
    release(claimed: ClaimedTask, error: string, maxAttempts: number): Promise<ReleaseOutcome>;
    /** Requeue every processing entry; only safe while no worker holds a claim */
    recover(): Promise<number>;
    /** Drop every entry, dead letters included; returns the number dropped */
    purge(): Promise<number>;
    stats(): Promise<QueueStats>;
    deadLetters(): Promise<TaskEnvelope[]>;
    health(): Promise<boolean>;
    close(): Promise<void>;
}

export interface KVQueueStoreOptions {
    /** Queue name used in the list keys (default 'tasks') */
    name?: string;
    /** Close the client with the store (default true) */
    ownsClient?: boolean;
    logger?: Logger;
}

/**
 * QueueStore over three KV lists: queue:{name}:pending, :processing and :failed.
 */
export class KVQueueStore implements QueueStore {
    private readonly pendingKey: string;
    private readonly processingKey: string;
    private readonly failedKey: string;
    private readonly ownsClient: boolean;
    private readonly logger: Logger;

    constructor(
        private readonly client: IKVClient,
        options: KVQueueStoreOptions = {}
    ) {
        const name = options.name ?? 'tasks';
        this.pendingKey = `queue:${name}:pending`;
        this.processingKey = `queue:${name}:processing`;
        this.failedKey = `queue:${name}:failed`;
        this.ownsClient = options.ownsClient ?? true;
        this.logger = options.logger ?? new ConsoleLogger('KVQueueStore');
    }

    async push(envelope: TaskEnvelope): Promise<void> {
        await this.client.rpush(this.pendingKey, JSON.stringify(envelope));
    }

    async claim(): Promise<ClaimedTask | null> {
        for (;;) {
            const raw = await this.client.lmove(this.pendingKey, this.processingKey);
            if (raw === null) {
                return null;
            }
            try {
                return { envelope: parseTaskEnvelope(JSON.parse(raw)), receipt: raw };
            } catch (error) {
                this.logger.error('Dead-lettering undecodable task entry:', error);
                await this.client.lrem(this.processingKey, raw);
                await this.client.rpush(this.failedKey, raw);
            }
        }
    }

    async ack(claimed: ClaimedTask): Promise<void> {
        await this.client.lrem(this.processingKey, claimed.receipt);
    }

    async release(claimed: ClaimedTask, error: string, maxAttempts: number): Promise<ReleaseOutcome> {
        const attempts = claimed.envelope.attempts + 1;
        const updated: TaskEnvelope = { ...claimed.envelope, attempts, lastError: error };
        await this.client.lrem(this.processingKey, claimed.receipt);
        if (attempts >= maxAttempts) {
            await this.client.rpush(this.failedKey, JSON.stringify(updated));
            return 'dead-lettered';
        }
        await this.client.rpush(this.pendingKey, JSON.stringify(updated));
        return 'retried';
    }

    async recover(): Promise<number> {
        let recovered = 0;
        while ((await this.client.lmove(this.processingKey, this.pendingKey)) !== null) {
            recovered++;
        }
        if (recovered > 0) {
            this.logger.info(`Requeued ${recovered} unacknowledged task(s)`);
        }
        return recovered;
    }

    async purge(): Promise<number> {
        const stats = await this.stats();
        await this.client.delete(this.pendingKey, this.processingKey, this.failedKey);
        return stats.pending + stats.processing + stats.failed;
    }

    async stats(): Promise<QueueStats> {
        return {
            pending: await this.client.llen(this.pendingKey),
            processing: await this.client.llen(this.processingKey),
            failed: await this.client.llen(this.failedKey),
        };
    }

    async deadLetters(): Promise<TaskEnvelope[]> {
        const entries = await this.client.lrange(this.failedKey, 0, -1);
        const envelopes: TaskEnvelope[] = [];
        for (const raw of entries) {
            try {
                envelopes.push(parseTaskEnvelope(JSON.parse(raw)));
            } catch (error) {
                this.logger.warn('Skipping undecodable dead letter:', error);
            }
        }
        return envelopes;
    }

    health(): Promise<boolean> {
        return this.client.health();
    }

    async close(): Promise<void> {
        if (this.ownsClient) {
            await this.client.close();
        }
    }
}
