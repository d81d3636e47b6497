import { Metadata } from '@docsift/content-model';
import type { ContentFetcher, ContentFetcherHost } from '../../plugin-engine/types.js';
import { CACHE_ID_FIELD } from '../../storage/DataStorage.js';

export interface HttpContentFetcherConfig {
    /** Request timeout in ms (default: 30000) */
    timeoutMs?: number;
    /** Defaults to the global fetch */
    fetch?: typeof fetch;
}

const DEFAULT_CONFIG: Required<Omit<HttpContentFetcherConfig, 'fetch'>> = {
    timeoutMs: 30000,
};

/** `text/html; charset=utf-8` → `text/html` */
export function baseMimeType(contentType: string | null): string | undefined {
    const base = contentType?.split(';')[0]?.trim().toLowerCase();
    return base ? base : undefined;
}

/** Last path segment, or the host name for a bare origin */
export function titleFromUrl(url: URL): string {
    const segments = url.pathname.split('/').filter(Boolean);
    const last = segments[segments.length - 1];
    return last ? decodeURIComponent(last) : url.hostname;
}

/**
 * Downloads http(s) resources. Text bodies are passed on as strings; the raw
 * body is also kept in the cache and its id recorded in `extra.cache_id`.
 */
export class HttpContentFetcher implements ContentFetcher {
    readonly pluginId = 'http_fetcher';
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(config: HttpContentFetcherConfig = {}) {
        this.timeoutMs = config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs;
        this.fetchImpl = config.fetch ?? fetch;
    }

    canFetch(_host: ContentFetcherHost, url: string): boolean {
        return /^https?:\/\//i.test(url);
    }

    async fetch(host: ContentFetcherHost, url: string): Promise<void> {
        const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
        if (!response.ok) {
            throw new Error(`HTTP ${response.status} fetching ${url}`);
        }

        const mimeType = baseMimeType(response.headers.get('content-type'));
        const bytes = new Uint8Array(await response.arrayBuffer());
        const isText = mimeType === undefined || mimeType.startsWith('text/') || mimeType.endsWith('+xml');
        const content = isText ? Buffer.from(bytes).toString('utf8') : bytes;

        const cacheId = await host.cache.save(host.pluginId, content);
        const base = host.discovered ?? new Metadata({ sourceUrl: url });
        const metadata = base.copy({
            title: base.title ?? titleFromUrl(new URL(url)),
            mimeType,
            extra: { ...base.extra, [CACHE_ID_FIELD]: cacheId },
        });

        host.logger.info(`Fetched ${bytes.length} bytes from ${url} (${mimeType ?? 'unknown type'})`);
        await host.extractFile(content, metadata);
    }
}
