import { contentToText, type Content, type Metadata } from '@docsift/content-model';
import type { ContentExtractor, ContentExtractorHost } from '../../plugin-engine/types.js';

const HTML_MIME_TYPES = ['text/html', 'application/xhtml+xml'];
const HTML_EXTENSIONS = ['.html', '.htm', '.xhtml'];

const ENTITIES: Readonly<Record<string, string>> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&nbsp;': ' ',
};

function decodeEntities(text: string): string {
    return text.replace(/&(?:amp|lt|gt|quot|#39|nbsp);/g, entity => ENTITIES[entity] ?? entity);
}

/**
 * Drops scripts, styles and tags, decodes the common entities and collapses whitespace.
 */
export function htmlToText(html: string): string {
    const stripped = html
        .replace(/<script\b[^>]*>[\s\S]*?<\/script>/gi, '')
        .replace(/<style\b[^>]*>[\s\S]*?<\/style>/gi, '')
        .replace(/<[^>]+>/g, ' ');
    return decodeEntities(stripped).replace(/\s+/g, ' ').trim();
}

export function htmlTitle(html: string): string | undefined {
    const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
    const title = match ? decodeEntities(match[1]).replace(/\s+/g, ' ').trim() : '';
    return title || undefined;
}

export class HtmlExtractor implements ContentExtractor {
    readonly pluginId = 'html_extractor';

    canExtract(url: string, mimeType?: string): boolean {
        if (mimeType) {
            return HTML_MIME_TYPES.includes(mimeType);
        }
        const lower = url.toLowerCase();
        return HTML_EXTENSIONS.some(extension => lower.endsWith(extension));
    }

    preferredMimeTypes(): string[] {
        return [...HTML_MIME_TYPES];
    }

    async extract(host: ContentExtractorHost, content: Content, metadata: Metadata): Promise<void> {
        const html = contentToText(content);
        const text = htmlToText(html);
        const extracted = metadata.copy({
            mimeType: 'text/plain',
            processingState: 'extracted',
            title: htmlTitle(html) ?? metadata.title ?? 'Untitled HTML Document',
            extra: { ...metadata.extra, sourceMimeType: metadata.mimeType ?? 'text/html' },
        });
        host.logger.info(`Extracted ${text.length} characters of text from ${metadata.sourceUrl}`);
        await host.storage.addItem(host, text, extracted);
    }
}
