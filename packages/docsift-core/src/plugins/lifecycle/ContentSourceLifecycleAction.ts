import { fanOut } from '@docsift/async-utils';
import { PluginHookError, ResourceUnavailableError } from '../../errors.js';
import type { ContentSource, ContentSourceHost, LifecycleAction, LifecycleHost } from '../../plugin-engine/types.js';

interface StartedSource {
    pluginId: string;
    source: ContentSource;
    host: ContentSourceHost;
}

/**
 * Starts every registered ContentSource with a host built for its own
 * identity, and stops the same (source, host) pairs in reverse order.
 */
export class ContentSourceLifecycleAction implements LifecycleAction {
    readonly pluginId = 'content_source_lifecycle';
    private started: StartedSource[] = [];

    async onStart(host: LifecycleHost): Promise<void> {
        const registrations = host.registry.getRegistrations('ContentSource');
        if (registrations.length === 0) {
            host.logger.info('No content sources registered');
            return;
        }
        if (!host.singletons.taskQueue) {
            const error = new ResourceUnavailableError('task queue', 'content sources need a task queue to schedule fetches');
            host.logger.warn(error.message);
            return;
        }

        const pairs: StartedSource[] = registrations.map(({ pluginId, implementation }) => ({
            pluginId,
            source: implementation,
            host: host.hosts.createContentSourceHost(pluginId),
        }));
        this.started.push(...pairs);

        const report = await fanOut(pairs, pair => pair.source.startSource(pair.host));
        for (const { key, error } of report.rejected) {
            host.logger.error(new PluginHookError(key.pluginId, 'startSource', error).message);
        }
        host.logger.info(`Started ${report.fulfilled.length}/${pairs.length} content source(s)`);
    }

    async onStop(host: LifecycleHost): Promise<void> {
        const pairs = this.started.reverse();
        this.started = [];
        if (pairs.length === 0) return;

        const report = await fanOut(pairs, pair => pair.source.stopSource(pair.host));
        for (const { key, error } of report.rejected) {
            host.logger.error(new PluginHookError(key.pluginId, 'stopSource', error).message);
        }
        host.logger.info(`Stopped ${pairs.length} content source(s)`);
    }
}
