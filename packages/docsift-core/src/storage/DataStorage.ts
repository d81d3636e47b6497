/**
 * Data storage backends: the terminal store for extracted content.
 *
 * Items are keyed `item_{n}`. An item's metadata may reference the cache
 * entry it was fetched into (`extra.cache_id`); removing the item hands that
 * id back so the caller can schedule the cache cleanup.
 */

import {
    Metadata,
    decodeContent,
    encodeContent,
    isEncodedContent,
    type Content,
} from '@docsift/content-model';
import type { IKVClient } from '../kv/IKVClient.js';
import { flattenMetadata, fromHashFields, reconstructMetadata, toHashFields } from '../kv/MetadataUtils.js';
import type { DataStorage, DataStorageHost, StoredItem } from '../plugin-engine/types.js';

export const CACHE_ID_FIELD = 'cache_id';

export function cacheIdOf(metadata: Metadata): string | null {
    const cacheId = metadata.extra[CACHE_ID_FIELD];
    return typeof cacheId === 'string' ? cacheId : null;
}

// =============================================================================
// Memory
// =============================================================================

export class MemoryDataStorage implements DataStorage {
    private items: Map<string, StoredItem> = new Map();
    private sequence = 0;

    async addItem(host: DataStorageHost, content: Content, metadata: Metadata): Promise<string> {
        const id = `item_${++this.sequence}`;
        this.items.set(id, { id, content, metadata });
        host.logger.debug(`Stored ${metadata.sourceUrl} as ${id}`);
        return id;
    }

    async updateItem(host: DataStorageHost, itemId: string, content: Content): Promise<void> {
        const item = this.require(itemId);
        this.items.set(itemId, { ...item, content });
        host.logger.debug(`Updated content of ${itemId}`);
    }

    async updateMetadata(host: DataStorageHost, itemId: string, metadata: Metadata): Promise<void> {
        const item = this.require(itemId);
        this.items.set(itemId, { ...item, metadata });
        host.logger.debug(`Updated metadata of ${itemId}`);
    }

    async findItemId(_host: DataStorageHost, metadata: Metadata): Promise<string | null> {
        for (const item of this.items.values()) {
            if (item.metadata.sourceUrl === metadata.sourceUrl) {
                return item.id;
            }
        }
        return null;
    }

    async findItem(itemId: string): Promise<StoredItem | null> {
        const item = this.items.get(itemId);
        return item ? { ...item } : null;
    }

    async removeItem(host: DataStorageHost, itemId: string): Promise<string | null> {
        const item = this.items.get(itemId);
        if (!item) {
            return null;
        }
        this.items.delete(itemId);
        host.logger.debug(`Removed ${itemId}`);
        return cacheIdOf(item.metadata);
    }

    async removeItemsByMetadata(host: DataStorageHost, metadata: Metadata): Promise<string[]> {
        return this.removeItemsByUrl(host, metadata.sourceUrl);
    }

    async removeItemsByUrl(host: DataStorageHost, url: string): Promise<string[]> {
        const cacheIds: string[] = [];
        for (const item of [...this.items.values()]) {
            if (item.metadata.sourceUrl !== url) continue;
            const cacheId = await this.removeItem(host, item.id);
            if (cacheId) cacheIds.push(cacheId);
        }
        return cacheIds;
    }

    /** Every stored item, in insertion order */
    list(): StoredItem[] {
        return [...this.items.values()].map(item => ({ ...item }));
    }

    async clear(): Promise<void> {
        this.items.clear();
    }

    private require(itemId: string): StoredItem {
        const item = this.items.get(itemId);
        if (!item) {
            throw new Error(`Item '${itemId}' not found`);
        }
        return item;
    }
}

// =============================================================================
// KV (Redis)
// =============================================================================

const SEQUENCE_KEY = 'items:seq';
const URL_INDEX_KEY = 'items:by_url';

/**
 * Key layout:
 * item:{id}            → hash of flattened metadata
 * item:{id}:content    → JSON-encoded content
 * items:by_url         → hash of source url → JSON list of item ids
 */
export class KVDataStorage implements DataStorage {
    constructor(
        private readonly client: IKVClient,
        private readonly ownsClient = true
    ) {}

    async addItem(host: DataStorageHost, content: Content, metadata: Metadata): Promise<string> {
        const id = `item_${await this.client.incr(SEQUENCE_KEY)}`;
        await this.writeContent(id, content);
        await this.writeMetadata(id, metadata);
        await this.indexUrl(metadata.sourceUrl, ids => [...ids, id]);
        host.logger.debug(`Stored ${metadata.sourceUrl} as ${id}`);
        return id;
    }

    async updateItem(host: DataStorageHost, itemId: string, content: Content): Promise<void> {
        await this.require(itemId);
        await this.writeContent(itemId, content);
        host.logger.debug(`Updated content of ${itemId}`);
    }

    async updateMetadata(host: DataStorageHost, itemId: string, metadata: Metadata): Promise<void> {
        const item = await this.require(itemId);
        await this.client.delete(`item:${itemId}`);
        await this.writeMetadata(itemId, metadata);
        if (item.metadata.sourceUrl !== metadata.sourceUrl) {
            await this.indexUrl(item.metadata.sourceUrl, ids => ids.filter(id => id !== itemId));
            await this.indexUrl(metadata.sourceUrl, ids => [...ids, itemId]);
        }
        host.logger.debug(`Updated metadata of ${itemId}`);
    }

    async findItemId(_host: DataStorageHost, metadata: Metadata): Promise<string | null> {
        const ids = await this.idsForUrl(metadata.sourceUrl);
        return ids[0] ?? null;
    }

    async findItem(itemId: string): Promise<StoredItem | null> {
        const fields = await this.client.hgetall(`item:${itemId}`);
        if (Object.keys(fields).length === 0) {
            return null;
        }
        const metadata = Metadata.fromJSON(reconstructMetadata(fromHashFields(fields)));
        const rawContent = await this.client.get(`item:${itemId}:content`);
        const encoded: unknown = rawContent === null ? null : JSON.parse(rawContent);
        const content = isEncodedContent(encoded) ? decodeContent(encoded) : '';
        return { id: itemId, content, metadata };
    }

    async removeItem(host: DataStorageHost, itemId: string): Promise<string | null> {
        const item = await this.findItem(itemId);
        if (!item) {
            return null;
        }
        await this.client.delete(`item:${itemId}`, `item:${itemId}:content`);
        await this.indexUrl(item.metadata.sourceUrl, ids => ids.filter(id => id !== itemId));
        host.logger.debug(`Removed ${itemId}`);
        return cacheIdOf(item.metadata);
    }

    async removeItemsByMetadata(host: DataStorageHost, metadata: Metadata): Promise<string[]> {
        return this.removeItemsByUrl(host, metadata.sourceUrl);
    }

    async removeItemsByUrl(host: DataStorageHost, url: string): Promise<string[]> {
        const cacheIds: string[] = [];
        for (const itemId of await this.idsForUrl(url)) {
            const cacheId = await this.removeItem(host, itemId);
            if (cacheId) cacheIds.push(cacheId);
        }
        return cacheIds;
    }

    async clear(): Promise<void> {
        await this.client.deleteRange('item:');
        await this.client.deleteRange('items:');
    }

    health(): Promise<boolean> {
        return this.client.health();
    }

    async close(): Promise<void> {
        if (this.ownsClient) {
            await this.client.close();
        }
    }

    private async require(itemId: string): Promise<StoredItem> {
        const item = await this.findItem(itemId);
        if (!item) {
            throw new Error(`Item '${itemId}' not found`);
        }
        return item;
    }

    private async writeContent(itemId: string, content: Content): Promise<void> {
        await this.client.set(`item:${itemId}:content`, JSON.stringify(encodeContent(content)));
    }

    private async writeMetadata(itemId: string, metadata: Metadata): Promise<void> {
        const record = metadata.toJSON();
        await this.client.hset(`item:${itemId}`, toHashFields(flattenMetadata({ ...record })));
    }

    private async idsForUrl(url: string): Promise<string[]> {
        const raw = await this.client.hget(URL_INDEX_KEY, url);
        const ids: unknown = raw === null ? [] : JSON.parse(raw);
        return Array.isArray(ids) ? ids.filter((id): id is string => typeof id === 'string') : [];
    }

    private async indexUrl(url: string, update: (ids: string[]) => string[]): Promise<void> {
        const ids = update(await this.idsForUrl(url));
        if (ids.length === 0) {
            await this.client.hdel(URL_INDEX_KEY, url);
        } else {
            await this.client.hset(URL_INDEX_KEY, { [url]: JSON.stringify(ids) });
        }
    }
}
