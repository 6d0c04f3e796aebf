/**
 * Content Extractor - Reads one file as text and applies the per-file character budget.
 */

import type { FileEntry } from './walker.js';
import { nodeFs, type ContextFs } from './fs.js';
import { toWarning, type ContextWarning } from './errors.js';

export interface ExtractedContent {
    entry: FileEntry;
    /** At most maxChars code points */
    text: string;
    truncated: boolean;
    /** Code points in the file before truncation */
    originalLength: number;
    /** Set when invalid UTF-8 had to be replaced */
    decodeWarning?: ContextWarning;
}

export type ExtractResult =
    | ({ ok: true } & ExtractedContent)
    | { ok: false; entry: FileEntry; error: ContextWarning };

const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const lenientDecoder = new TextDecoder('utf-8');

/**
 * Cut text to at most maxChars Unicode code points.
 * Surrogate pairs are never split.
 */
export function truncateChars(text: string, maxChars: number): { text: string; truncated: boolean; length: number } {
    // Fast path: even counting every UTF-16 unit, it fits
    if (text.length <= maxChars) {
        return { text, truncated: false, length: countCodePoints(text) };
    }

    let count = 0;
    let cut = -1;
    for (let i = 0; i < text.length; i++) {
        const code = text.charCodeAt(i);
        // A high surrogate followed by its low half is one character
        if (code >= 0xd800 && code <= 0xdbff && i + 1 < text.length) {
            const next = text.charCodeAt(i + 1);
            if (next >= 0xdc00 && next <= 0xdfff) {
                if (count === maxChars) cut = i;
                i++;
                count++;
                continue;
            }
        }
        if (count === maxChars) cut = i;
        count++;
    }

    if (cut === -1) return { text, truncated: false, length: count };
    return { text: text.slice(0, cut), truncated: true, length: count };
}

function countCodePoints(text: string): number {
    return Array.from(text).length;
}

/**
 * Decode UTF-8, replacing invalid sequences with U+FFFD.
 * TextDecoder drops a leading BOM on its own.
 */
export function decodeText(bytes: Uint8Array): { text: string; valid: boolean } {
    try {
        return { text: strictDecoder.decode(bytes), valid: true };
    } catch {
        return { text: lenientDecoder.decode(bytes), valid: false };
    }
}

/**
 * Read a file and cut it to maxChars.
 * A read failure is returned as a result, never thrown.
 */
export function extract(entry: FileEntry, maxChars: number, fs: ContextFs = nodeFs): ExtractResult {
    let bytes: Buffer;
    try {
        bytes = fs.readFileSync(entry.absolutePath);
    } catch (error) {
        return { ok: false, entry, error: toWarning(entry.relativePath, error, 'ReadError') };
    }

    const decoded = decodeText(bytes);
    const { text, truncated, length } = truncateChars(decoded.text, maxChars);

    const result: { ok: true } & ExtractedContent = { ok: true, entry, text, truncated, originalLength: length };
    if (!decoded.valid) {
        result.decodeWarning = {
            kind: 'DecodeError',
            path: entry.relativePath,
            message: 'file is not valid UTF-8; invalid bytes were replaced',
        };
    }
    return result;
}
