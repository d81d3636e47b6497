import { contentToText, type Content, type Metadata } from '@docsift/content-model';
import type { ContentExtractor, ContentExtractorHost } from '../../plugin-engine/types.js';

const TEXT_EXTENSIONS = ['.txt', '.md', '.rst', '.log', '.cfg', '.ini', '.conf'];
const MAX_TITLE_LENGTH = 100;

/**
 * First non-empty line, cut at 100 characters.
 */
export function titleFromText(text: string): string {
    const firstLine = text.trim().split('\n')[0]?.trim();
    if (!firstLine) {
        return 'Untitled Document';
    }
    return firstLine.length > MAX_TITLE_LENGTH ? `${firstLine.slice(0, MAX_TITLE_LENGTH)}...` : firstLine;
}

export class PlainTextExtractor implements ContentExtractor {
    readonly pluginId = 'plain_text_extractor';

    canExtract(url: string, mimeType?: string): boolean {
        if (mimeType) {
            return mimeType.startsWith('text/');
        }
        const lower = url.toLowerCase();
        return TEXT_EXTENSIONS.some(extension => lower.endsWith(extension));
    }

    preferredMimeTypes(): string[] {
        return ['text/plain', 'text/markdown', 'text/x-rst', 'text/x-log', 'text/x-config'];
    }

    async extract(host: ContentExtractorHost, content: Content, metadata: Metadata): Promise<void> {
        const text = contentToText(content);
        const extracted = metadata.copy({
            mimeType: 'text/plain',
            processingState: 'extracted',
            title: metadata.title ?? titleFromText(text),
        });
        host.logger.info(`Extracted ${text.length} characters from ${metadata.sourceUrl}`);
        await host.storage.addItem(host, text, extracted);
    }
}
