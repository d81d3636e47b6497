/**
 * Pipeline Task Executor
 *
 * Runs one unit of pipeline work against a Singletons set: picks the first
 * fetcher or extractor that accepts the item, builds its host under the
 * plugin's registered identity and invokes it.
 */

import { Metadata, decodeContent, type Content } from '@docsift/content-model';
import { PluginHookError, TaskExecutionError } from '../errors.js';
import type { Logger } from '../logging/Logger.js';
import { HostFactory } from '../plugin-engine/hosts.js';
import type { Singletons } from '../plugin-engine/types.js';
import type { TaskEnvelope, TaskExecutor, TaskPayloads, TaskResult } from './types.js';

function success(message: string): TaskResult {
    return { status: 'success', message };
}

function failure(message: string): TaskResult {
    return { status: 'error', message };
}

export class PipelineTaskExecutor implements TaskExecutor {
    private readonly logger: Logger;
    private readonly hosts: HostFactory;

    constructor(private readonly singletons: Singletons) {
        this.logger = singletons.logger.child('TaskExecutor');
        this.hosts = new HostFactory(singletons);
    }

    /**
     * Hook failures become an error result. A throwing selection predicate
     * propagates to the caller.
     */
    async execute(envelope: TaskEnvelope): Promise<TaskResult> {
        switch (envelope.name) {
            case 'fetch_content':
                return this.fetchContent(envelope.id, envelope.payload);
            case 'extract_content':
                return this.extractContent(envelope.id, envelope.payload);
            case 'cleanup_cache':
                return this.cleanupCache(envelope.payload);
        }
    }

    private async fetchContent(taskId: string, payload: TaskPayloads['fetch_content']): Promise<TaskResult> {
        const { url } = payload;
        let discovered: Metadata | null;
        try {
            discovered = payload.metadata ? Metadata.fromJSON(payload.metadata) : null;
        } catch (error) {
            return this.rejectPayload(taskId, error);
        }

        for (const { pluginId, implementation: fetcher } of this.singletons.registry.getRegistrations('ContentFetcher')) {
            const host = this.hosts.createContentFetcherHost(pluginId, discovered);
            if (!fetcher.canFetch(host, url)) {
                continue;
            }
            try {
                await fetcher.fetch(host, url);
                return success(`Fetched ${url} with ${pluginId}`);
            } catch (error) {
                return this.hookFailed(pluginId, 'fetch', error);
            }
        }

        this.logger.warn(`No fetcher found for URL: ${url}`);
        return failure(`No fetcher found for URL: ${url}`);
    }

    private async extractContent(taskId: string, payload: TaskPayloads['extract_content']): Promise<TaskResult> {
        let content: Content;
        let metadata: Metadata;
        try {
            content = decodeContent(payload.content);
            metadata = Metadata.fromJSON(payload.metadata);
        } catch (error) {
            return this.rejectPayload(taskId, error);
        }
        const url = metadata.sourceUrl;

        for (const { pluginId, implementation: extractor } of this.singletons.registry.getRegistrations(
            'ContentExtractor'
        )) {
            if (!extractor.canExtract(url, metadata.mimeType)) {
                continue;
            }
            try {
                await extractor.extract(this.hosts.createContentExtractorHost(pluginId), content, metadata);
                return success(`Extracted ${url} with ${pluginId}`);
            } catch (error) {
                return this.hookFailed(pluginId, 'extract', error);
            }
        }

        const description = metadata.mimeType ? `${url} (${metadata.mimeType})` : url;
        this.logger.warn(`No extractor found for: ${description}`);
        return failure(`No extractor found for: ${description}`);
    }

    private async cleanupCache(payload: TaskPayloads['cleanup_cache']): Promise<TaskResult> {
        const removed = await this.singletons.cache.removeAll(payload.cacheIds);
        return success(`Cleaned up ${removed.length} cache entries`);
    }

    private hookFailed(pluginId: string, hook: string, cause: unknown): TaskResult {
        const error = new PluginHookError(pluginId, hook, cause);
        this.logger.error(error.message);
        return failure(error.message);
    }

    private rejectPayload(taskId: string, cause: unknown): TaskResult {
        const error = new TaskExecutionError(
            `Invalid payload: ${cause instanceof Error ? cause.message : String(cause)}`,
            taskId
        );
        this.logger.error(`Task ${taskId}: ${error.message}`);
        return failure(error.message);
    }
}
