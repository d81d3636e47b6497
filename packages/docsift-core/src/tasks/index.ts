export * from './types.js';
export { ImmediateTaskQueue } from './ImmediateTaskQueue.js';
export type { TaskCompletedEvent } from './ImmediateTaskQueue.js';
export { DurableTaskQueue } from './DurableTaskQueue.js';
export { KVQueueStore } from './QueueStore.js';
export type { ClaimedTask, KVQueueStoreOptions, QueueStats, QueueStore, ReleaseOutcome } from './QueueStore.js';
export { PipelineTaskExecutor } from './PipelineTaskExecutor.js';
export { TaskWorker, InProcessTaskRunner } from './TaskWorker.js';
export type { TaskProcessedEvent, TaskRunner, TaskWorkerConfig } from './TaskWorker.js';
export { ThreadPoolTaskRunner } from './ThreadPoolTaskRunner.js';
export type { ThreadPoolOptions } from './ThreadPoolTaskRunner.js';
