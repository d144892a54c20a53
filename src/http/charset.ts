import { TextDecoder } from 'node:util';
import { createLogger } from '../logger.js';

const log = createLogger('Charset');

const SNIFF_BYTES = 2048;
const UTF8_BOM = [0xef, 0xbb, 0xbf];

export function charsetFromContentType(contentType: string | undefined): string | null {
    if (!contentType) return null;
    const match = /charset\s*=\s*["']?([^;"'\s]+)/i.exec(contentType);
    return match ? match[1].toLowerCase() : null;
}

// Finds <meta charset="..."> or <meta http-equiv="Content-Type" content="...; charset=...">.
export function sniffMetaCharset(body: Uint8Array): string | null {
    const head = Buffer.from(body.subarray(0, SNIFF_BYTES)).toString('latin1');
    const match = /<meta[^>]+charset\s*=\s*["']?\s*([\w.:-]+)/i.exec(head);
    return match ? match[1].toLowerCase() : null;
}

function hasUtf8Bom(body: Uint8Array): boolean {
    return UTF8_BOM.every((byte, i) => body[i] === byte);
}

function createDecoder(label: string): TextDecoder | null {
    try {
        return new TextDecoder(label);
    } catch {
        return null;
    }
}

export interface DecodedBody {
    html: string;
    charset: string;
}

/**
 * Decodes a response body with the charset the page declares: BOM, then the
 * Content-Type header, then a <meta> declaration, then UTF-8.
 */
export function decodeBody(body: Uint8Array, contentType?: string): DecodedBody {
    const declared = hasUtf8Bom(body)
        ? 'utf-8'
        : charsetFromContentType(contentType) ?? sniffMetaCharset(body) ?? 'utf-8';

    let decoder = createDecoder(declared);
    if (!decoder) {
        log.warn(`Unknown charset "${declared}", decoding as utf-8`);
        decoder = new TextDecoder('utf-8');
    }

    return { html: decoder.decode(body), charset: decoder.encoding };
}
