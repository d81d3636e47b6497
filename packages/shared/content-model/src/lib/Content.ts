/**
 * Raw content moving between pipeline stages: decoded text or bytes.
 */
export type Content = string | Uint8Array;

/**
 * Content form carried in durable task payloads.
 */
export interface EncodedContent {
    encoding: 'utf8' | 'base64';
    data: string;
}

export function encodeContent(content: Content): EncodedContent {
    if (typeof content === 'string') {
        return { encoding: 'utf8', data: content };
    }
    return { encoding: 'base64', data: Buffer.from(content).toString('base64') };
}

export function decodeContent(encoded: EncodedContent): Content {
    if (encoded.encoding === 'utf8') {
        return encoded.data;
    }
    return new Uint8Array(Buffer.from(encoded.data, 'base64'));
}

export function isEncodedContent(value: unknown): value is EncodedContent {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const encoding: unknown = Reflect.get(value, 'encoding');
    const data: unknown = Reflect.get(value, 'data');
    return (encoding === 'utf8' || encoding === 'base64') && typeof data === 'string';
}

/**
 * Decode content to text. Bytes are read as UTF-8.
 */
export function contentToText(content: Content): string {
    return typeof content === 'string' ? content : Buffer.from(content).toString('utf8');
}
