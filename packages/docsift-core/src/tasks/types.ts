/**
 * Task Types
 *
 * Units of pipeline work and the queue abstraction that carries them.
 * Payloads are plain JSON so a durable queue can persist them and a worker
 * in another thread or process can decode them.
 */

import {
    encodeContent,
    isEncodedContent,
    type Content,
    type EncodedContent,
    type Metadata,
    type MetadataRecord,
} from '@docsift/content-model';
import { TaskExecutionError } from '../errors.js';

// =============================================================================
// Requests
// =============================================================================

export interface TaskPayloads {
    fetch_content: { url: string; metadata: MetadataRecord | null };
    extract_content: { content: EncodedContent; metadata: MetadataRecord };
    cleanup_cache: { cacheIds: string[] };
}

export type TaskName = keyof TaskPayloads;

export type TaskRequest = { [N in TaskName]: { name: N; payload: TaskPayloads[N] } }[TaskName];

/**
 * Persisted unit of the durable queue.
 */
export type TaskEnvelope = TaskRequest & {
    id: string;
    /** Executions already attempted */
    attempts: number;
    /** ISO timestamp */
    enqueuedAt: string;
    lastError?: string;
};

export interface TaskResult {
    status: 'success' | 'error';
    message: string;
}

export const TASK_NAMES: readonly TaskName[] = ['fetch_content', 'extract_content', 'cleanup_cache'];

export function fetchContentTask(url: string, metadata?: Metadata | null): TaskRequest {
    return { name: 'fetch_content', payload: { url, metadata: metadata ? metadata.toJSON() : null } };
}

export function extractContentTask(content: Content, metadata: Metadata): TaskRequest {
    return { name: 'extract_content', payload: { content: encodeContent(content), metadata: metadata.toJSON() } };
}

export function cleanupCacheTask(cacheIds: readonly string[]): TaskRequest {
    return { name: 'cleanup_cache', payload: { cacheIds: [...cacheIds] } };
}

// =============================================================================
// Queue contracts
// =============================================================================

export type TaskExecutionMode = 'immediate' | 'durable';

export interface TaskExecutor {
    execute(envelope: TaskEnvelope): Promise<TaskResult>;
}

export interface TaskQueue {
    readonly mode: TaskExecutionMode;
    /** Attach the executor that runs units inline (immediate queues only) */
    bind?(executor: TaskExecutor): void;
    /** Enqueue or run a unit; resolves to its task id */
    schedule(request: TaskRequest): Promise<string>;
    health?(): Promise<boolean>;
    close(): Promise<void>;
}

/**
 * Recipe a worker uses to build its own WorkerContext. Travels with the task.
 */
export interface WorkerContextDescriptor {
    profile: string;
    userConfig?: Record<string, unknown>;
    /** Plugin module paths discovered on top of the profile */
    paths?: string[];
}

// =============================================================================
// Decoding
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMetadataRecord(value: unknown): value is MetadataRecord {
    return isRecord(value) && typeof value.sourceUrl === 'string';
}

function decodeRequest(name: unknown, payload: unknown, id?: string): TaskRequest {
    if (!isRecord(payload)) {
        throw new TaskExecutionError('Task payload must be an object', id);
    }
    switch (name) {
        case 'fetch_content': {
            const { url, metadata } = payload;
            if (typeof url !== 'string' || (metadata !== null && !isMetadataRecord(metadata))) {
                throw new TaskExecutionError('Invalid fetch_content payload', id);
            }
            return { name: 'fetch_content', payload: { url, metadata } };
        }
        case 'extract_content': {
            const { content, metadata } = payload;
            if (!isEncodedContent(content) || !isMetadataRecord(metadata)) {
                throw new TaskExecutionError('Invalid extract_content payload', id);
            }
            return { name: 'extract_content', payload: { content, metadata } };
        }
        case 'cleanup_cache': {
            const { cacheIds } = payload;
            if (!Array.isArray(cacheIds) || !cacheIds.every((c): c is string => typeof c === 'string')) {
                throw new TaskExecutionError('Invalid cleanup_cache payload', id);
            }
            return { name: 'cleanup_cache', payload: { cacheIds } };
        }
        default:
            throw new TaskExecutionError(`Unknown task name: ${String(name)}`, id);
    }
}

/**
 * Validate a stored envelope (already JSON-parsed).
 */
export function parseTaskEnvelope(value: unknown): TaskEnvelope {
    if (!isRecord(value)) {
        throw new TaskExecutionError('Task envelope must be an object');
    }
    const { id, attempts, enqueuedAt, lastError } = value;
    if (typeof id !== 'string') {
        throw new TaskExecutionError('Task envelope has no id');
    }
    const request = decodeRequest(value.name, value.payload, id);
    return {
        ...request,
        id,
        attempts: typeof attempts === 'number' ? attempts : 0,
        enqueuedAt: typeof enqueuedAt === 'string' ? enqueuedAt : new Date(0).toISOString(),
        ...(typeof lastError === 'string' ? { lastError } : {}),
    };
}
