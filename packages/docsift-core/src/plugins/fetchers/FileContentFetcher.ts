import * as fs from 'fs/promises';
import { existsSync, statSync } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { fileTypeFromBuffer } from 'file-type';
import { Metadata, type Content } from '@docsift/content-model';
import type { ContentFetcher, ContentFetcherHost } from '../../plugin-engine/types.js';
import { hasErrorCode } from '../../utils/ErrnoUtils.js';

const MIME_TYPES: Readonly<Record<string, string>> = {
    '.txt': 'text/plain',
    '.md': 'text/markdown',
    '.html': 'text/html',
    '.htm': 'text/html',
    '.json': 'application/json',
    '.xml': 'application/xml',
    '.pdf': 'application/pdf',
    '.doc': 'application/msword',
    '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    '.csv': 'text/csv',
};

const FALLBACK_MIME_TYPE = 'application/octet-stream';
const BINARY_SNIFF_BYTES = 1024;

function hasScheme(url: string): boolean {
    return /^[a-z][a-z0-9+.-]*:\/\//i.test(url);
}

/**
 * A file is binary when a NUL byte shows up in its first kilobyte.
 */
export function isBinary(bytes: Uint8Array): boolean {
    return bytes.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Text when the bytes are valid UTF-8 and not binary; the bytes themselves
 * otherwise.
 */
export function decodeFileContent(bytes: Uint8Array): Content {
    if (isBinary(bytes)) {
        return bytes;
    }
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
        if (error instanceof TypeError) {
            return bytes;
        }
        throw error;
    }
}

export async function detectMimeType(filePath: string, bytes: Uint8Array): Promise<string> {
    const known = MIME_TYPES[path.extname(filePath).toLowerCase()];
    if (known) {
        return known;
    }
    const sniffed = await fileTypeFromBuffer(bytes);
    return sniffed?.mime ?? FALLBACK_MIME_TYPE;
}

/**
 * Reads `file://` URLs and plain paths of existing files.
 */
export class FileContentFetcher implements ContentFetcher {
    readonly pluginId = 'file_fetcher';

    canFetch(_host: ContentFetcherHost, url: string): boolean {
        if (url.startsWith('file://')) {
            return true;
        }
        if (hasScheme(url)) {
            return false;
        }
        return existsSync(url) && statSync(url).isFile();
    }

    async fetch(host: ContentFetcherHost, url: string): Promise<void> {
        const filePath = path.resolve(url.startsWith('file://') ? fileURLToPath(url) : url);

        let buffer: Buffer;
        try {
            buffer = await fs.readFile(filePath);
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                throw new Error(`File not found: ${filePath}`);
            }
            throw error;
        }

        const bytes = new Uint8Array(buffer);
        const mimeType = await detectMimeType(filePath, bytes);
        const content = decodeFileContent(bytes);

        const base = host.discovered ?? new Metadata({ sourceUrl: url });
        const metadata = base.copy({
            title: base.title ?? path.basename(filePath),
            mimeType,
            location: filePath,
        });

        host.logger.info(`Fetched ${bytes.length} bytes from ${filePath} (${mimeType})`);
        await host.extractFile(content, metadata);
    }
}
