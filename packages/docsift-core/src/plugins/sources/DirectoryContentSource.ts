/**
 * Directory Content Source
 *
 * Enumerates the files under `plugins.directory_watcher.path` and schedules a
 * fetch for each one not stored yet. With `watch: true` a chokidar watcher
 * keeps scheduling added or changed files and drops the items of deleted
 * ones.
 */

import * as fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { watch, type FSWatcher } from 'chokidar';
import { Metadata } from '@docsift/content-model';
import { describeError } from '@docsift/async-utils';
import type {
    ConfigurationProvider,
    ContentSource,
    ContentSourceHost,
    DiscoveredItem,
} from '../../plugin-engine/types.js';
import { hasErrorCode } from '../../utils/ErrnoUtils.js';

export const DIRECTORY_SOURCE_ID = 'directory_watcher';
const SECTION = `plugins.${DIRECTORY_SOURCE_ID}`;

const DEFAULT_CONFIGURATION = `
plugins:
  ${DIRECTORY_SOURCE_ID}:
    path: \${DOCSIFT_WATCH_DIR:-.}
    recursive: true
    file_extensions: []
    watch: false
    stability_threshold_ms: 2000
`;

export interface DirectorySettings {
    path: string;
    recursive: boolean;
    /** Lower-case, with leading dot; empty accepts every file */
    fileExtensions: string[];
    watch: boolean;
    stabilityThresholdMs: number;
}

export function readSettings(host: ContentSourceHost): DirectorySettings {
    const { configuration } = host;
    return {
        path: path.resolve(configuration.getString(`${SECTION}.path`, '.')),
        recursive: configuration.getBoolean(`${SECTION}.recursive`, true),
        fileExtensions: configuration
            .getStringArray(`${SECTION}.file_extensions`, [])
            .map(ext => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()),
        watch: configuration.getBoolean(`${SECTION}.watch`, false),
        stabilityThresholdMs: configuration.getNumber(`${SECTION}.stability_threshold_ms`, 2000),
    };
}

/**
 * Defaults for `plugins.directory_watcher`. Register it before any provider
 * meant to override them.
 */
export class DirectorySourceDefaults implements ConfigurationProvider {
    readonly pluginId = `${DIRECTORY_SOURCE_ID}_defaults`;

    getConfigurationId(): string {
        return DIRECTORY_SOURCE_ID;
    }

    getDefaultConfiguration(): string {
        return DEFAULT_CONFIGURATION;
    }
}

export class DirectoryContentSource implements ContentSource {
    readonly pluginId = DIRECTORY_SOURCE_ID;
    private watchers = new Map<string, FSWatcher>();

    getConfigurationId(): string {
        return DIRECTORY_SOURCE_ID;
    }

    async discoverContent(host: ContentSourceHost): Promise<DiscoveredItem[]> {
        const settings = readSettings(host);
        const items: DiscoveredItem[] = [];

        for await (const filePath of this.walk(host, settings.path, settings.recursive)) {
            if (!this.accepts(settings, filePath)) continue;
            const item = await this.describe(filePath);
            if (item) items.push(item);
        }

        host.logger.info(`Discovered ${items.length} files in ${settings.path}`);
        return items;
    }

    async startSource(host: ContentSourceHost): Promise<void> {
        const settings = readSettings(host);
        let scheduled = 0;
        let skipped = 0;

        for (const [url, metadata] of await this.discoverContent(host)) {
            try {
                const existing = await host.dataStorage.findItemId(host, metadata);
                if (existing) {
                    host.logger.debug(`Skipping ${url}: already stored as ${existing}`);
                    skipped++;
                    continue;
                }
            } catch (error) {
                host.logger.warn(`Could not check existing content for ${url}: ${describeError(error)}`);
            }
            if (await host.scheduleFetch(url, metadata)) {
                scheduled++;
            }
        }

        host.logger.info(`Monitoring ${settings.path}: scheduled ${scheduled} new files, skipped ${skipped} existing files`);

        if (settings.watch) {
            this.startWatching(host, settings);
        }
    }

    async stopSource(host: ContentSourceHost): Promise<void> {
        const watcher = this.watchers.get(host.pluginId);
        if (watcher) {
            this.watchers.delete(host.pluginId);
            await watcher.close();
        }
        host.logger.info('Stopped monitoring');
    }

    // =========================================================================
    // Discovery
    // =========================================================================

    private async *walk(host: ContentSourceHost, directory: string, recursive: boolean): AsyncGenerator<string> {
        let entries: Dirent[];
        try {
            entries = await fs.readdir(directory, { withFileTypes: true });
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                host.logger.warn(`Watch directory does not exist: ${directory}`);
            } else if (hasErrorCode(error, 'EACCES') || hasErrorCode(error, 'EPERM')) {
                host.logger.warn(`Permission denied: ${directory} - skipping`);
            } else {
                host.logger.error(`Error reading directory ${directory}: ${describeError(error)}`);
            }
            return;
        }

        const subdirs: string[] = [];
        for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
            const fullPath = path.join(directory, entry.name);
            if (entry.isDirectory()) {
                subdirs.push(fullPath);
            } else if (entry.isFile()) {
                yield fullPath;
            }
        }

        if (recursive) {
            for (const subdir of subdirs) {
                yield* this.walk(host, subdir, recursive);
            }
        }
    }

    private accepts(settings: DirectorySettings, filePath: string): boolean {
        return (
            settings.fileExtensions.length === 0 ||
            settings.fileExtensions.includes(path.extname(filePath).toLowerCase())
        );
    }

    private async describe(filePath: string): Promise<DiscoveredItem | null> {
        let stats: Stats;
        try {
            stats = await fs.stat(filePath);
        } catch (error) {
            // Removed between listing and stat
            if (hasErrorCode(error, 'ENOENT')) return null;
            throw error;
        }
        const url = pathToFileURL(filePath).href;
        const metadata = new Metadata({
            sourceUrl: url,
            title: path.basename(filePath),
            location: filePath,
            modifiedAt: stats.mtime,
            extra: {
                file_path: filePath,
                file_size: stats.size,
                file_modified: stats.mtime.toISOString(),
                source_plugin: DIRECTORY_SOURCE_ID,
            },
        });
        return [url, metadata];
    }

    // =========================================================================
    // Watching
    // =========================================================================

    private startWatching(host: ContentSourceHost, settings: DirectorySettings): void {
        if (this.watchers.has(host.pluginId)) return;

        const watcher = watch(settings.path, {
            ignoreInitial: true,
            persistent: true,
            depth: settings.recursive ? undefined : 0,
            awaitWriteFinish: {
                stabilityThreshold: settings.stabilityThresholdMs,
                pollInterval: Math.max(100, Math.floor(settings.stabilityThresholdMs / 4)),
            },
        });

        const guarded = (event: string, handler: (filePath: string) => Promise<void>) => (filePath: string) => {
            handler(filePath).catch((error: unknown) => {
                host.logger.error(`Error handling ${event} for ${filePath}: ${describeError(error)}`);
            });
        };

        watcher.on('add', guarded('add', filePath => this.fileAdded(host, settings, filePath)));
        watcher.on('change', guarded('change', filePath => this.fileChanged(host, settings, filePath)));
        watcher.on('unlink', guarded('unlink', filePath => this.fileRemoved(host, settings, filePath)));
        watcher.on('error', (error: unknown) => {
            host.logger.error(`Watcher error: ${describeError(error)}`);
        });
        watcher.on('ready', () => {
            host.logger.info(`Watching for file changes on ${settings.path}`);
        });

        this.watchers.set(host.pluginId, watcher);
    }

    async fileAdded(host: ContentSourceHost, settings: DirectorySettings, filePath: string): Promise<void> {
        if (!this.accepts(settings, filePath)) return;
        const item = await this.describe(filePath);
        if (item) await host.scheduleFetch(...item);
    }

    /**
     * The stored items of a changed file are replaced, not duplicated: they
     * are removed (with their cache entries) before the fetch is scheduled.
     */
    async fileChanged(host: ContentSourceHost, settings: DirectorySettings, filePath: string): Promise<void> {
        if (!this.accepts(settings, filePath)) return;
        await this.dropStoredItems(host, filePath);
        await this.fileAdded(host, settings, filePath);
    }

    async fileRemoved(host: ContentSourceHost, settings: DirectorySettings, filePath: string): Promise<void> {
        if (!this.accepts(settings, filePath)) return;
        await this.dropStoredItems(host, filePath);
        host.logger.info(`Removed items of deleted file ${filePath}`);
    }

    private async dropStoredItems(host: ContentSourceHost, filePath: string): Promise<void> {
        const cacheIds = await host.dataStorage.removeItemsByUrl(host, pathToFileURL(filePath).href);
        await host.scheduleCacheCleanup(cacheIds);
    }
}
