/**
 * Content caches.
 *
 * Cache ids are `{partition}|{ext}|{uuid}|{b|t}`: the owning partition, the
 * file extension (possibly empty), a random id, and whether the entry holds
 * bytes or text. The id alone is enough to locate and decode an entry.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import type { Content } from '@docsift/content-model';
import type { CacheManager } from '../plugin-engine/types.js';
import { hasErrorCode } from '../utils/ErrnoUtils.js';

export interface CacheId {
    partition: string;
    extension: string;
    uuid: string;
    binary: boolean;
}

function normalizeExtension(extension = ''): string {
    if (!extension) return '';
    return extension.startsWith('.') ? extension : `.${extension}`;
}

export function formatCacheId(id: CacheId): string {
    return [id.partition, id.extension, id.uuid, id.binary ? 'b' : 't'].join('|');
}

/**
 * Parse from the right: the partition itself may contain '|'.
 */
export function parseCacheId(cacheId: string): CacheId | null {
    const parts = cacheId.split('|');
    if (parts.length < 4) {
        return null;
    }
    const kind = parts[parts.length - 1];
    if (kind !== 'b' && kind !== 't') {
        return null;
    }
    return {
        partition: parts.slice(0, -3).join('|'),
        extension: parts[parts.length - 3],
        uuid: parts[parts.length - 2],
        binary: kind === 'b',
    };
}

function newCacheId(partition: string, content: Content, extension?: string): CacheId {
    return {
        partition,
        extension: normalizeExtension(extension),
        uuid: randomUUID(),
        binary: typeof content !== 'string',
    };
}

// =============================================================================
// Memory
// =============================================================================

export class MemoryCacheManager implements CacheManager {
    private entries: Map<string, Content> = new Map();

    async save(partition: string, content: Content, extension?: string): Promise<string> {
        const cacheId = formatCacheId(newCacheId(partition, content, extension));
        this.entries.set(cacheId, typeof content === 'string' ? content : new Uint8Array(content));
        return cacheId;
    }

    async get(cacheId: string): Promise<Content | null> {
        const content = this.entries.get(cacheId);
        if (content === undefined) return null;
        return typeof content === 'string' ? content : new Uint8Array(content);
    }

    async remove(cacheId: string): Promise<boolean> {
        return this.entries.delete(cacheId);
    }

    async removeAll(cacheIds: readonly string[]): Promise<string[]> {
        return cacheIds.filter(cacheId => this.entries.delete(cacheId));
    }

    async getAll(partition: string): Promise<string[]> {
        return [...this.entries.keys()].filter(cacheId => parseCacheId(cacheId)?.partition === partition);
    }

    async clear(): Promise<void> {
        this.entries.clear();
    }
}

// =============================================================================
// File
// =============================================================================

/**
 * One file per entry under `{baseDir}/{encoded partition}/{uuid}.{b|t}{ext}`.
 */
export class FileCacheManager implements CacheManager {
    constructor(private readonly baseDir: string) {}

    async save(partition: string, content: Content, extension?: string): Promise<string> {
        const id = newCacheId(partition, content, extension);
        const filePath = this.entryPath(id);
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, content);
        return formatCacheId(id);
    }

    async get(cacheId: string): Promise<Content | null> {
        const id = parseCacheId(cacheId);
        if (!id) return null;
        try {
            const buffer = await fs.readFile(this.entryPath(id));
            return id.binary ? new Uint8Array(buffer) : buffer.toString('utf8');
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) return null;
            throw error;
        }
    }

    async remove(cacheId: string): Promise<boolean> {
        const id = parseCacheId(cacheId);
        if (!id) return false;
        try {
            await fs.unlink(this.entryPath(id));
            return true;
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) return false;
            throw error;
        }
    }

    async removeAll(cacheIds: readonly string[]): Promise<string[]> {
        const removed: string[] = [];
        for (const cacheId of cacheIds) {
            if (await this.remove(cacheId)) {
                removed.push(cacheId);
            }
        }
        return removed;
    }

    async getAll(partition: string): Promise<string[]> {
        let names: string[];
        try {
            names = await fs.readdir(path.join(this.baseDir, encodeURIComponent(partition)));
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) return [];
            throw error;
        }
        return names.flatMap(name => {
            const dot = name.indexOf('.');
            const kind = name.charAt(dot + 1);
            if (dot <= 0 || (kind !== 'b' && kind !== 't')) {
                return [];
            }
            return [
                formatCacheId({
                    partition,
                    extension: name.slice(dot + 2),
                    uuid: name.slice(0, dot),
                    binary: kind === 'b',
                }),
            ];
        });
    }

    async clear(): Promise<void> {
        await fs.rm(this.baseDir, { recursive: true, force: true });
    }

    private entryPath(id: CacheId): string {
        const kind = id.binary ? 'b' : 't';
        return path.join(this.baseDir, encodeURIComponent(id.partition), `${id.uuid}.${kind}${id.extension}`);
    }
}
