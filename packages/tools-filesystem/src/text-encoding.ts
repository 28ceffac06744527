import { FileSystemError } from './errors.js';

/** Bytes inspected for NUL when deciding whether a file is binary */
export const BINARY_SNIFF_BYTES = 8192;

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

/**
 * Decode file bytes as UTF-8 text, or fail with `filesystem_not_text`.
 * A NUL byte in the first chunk marks the file as binary; so does any
 * invalid UTF-8 sequence. A leading BOM is dropped from the decoded text.
 */
export function decodeText(buffer: Buffer, displayPath: string): string {
    const sniff = buffer.subarray(0, BINARY_SNIFF_BYTES);
    if (sniff.includes(0)) {
        throw FileSystemError.notText(displayPath, 'contains NUL bytes');
    }

    const body = buffer.subarray(0, UTF8_BOM.length).equals(UTF8_BOM)
        ? buffer.subarray(UTF8_BOM.length)
        : buffer;
    try {
        return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(body);
    } catch (error) {
        if (error instanceof TypeError) {
            throw FileSystemError.notText(displayPath, 'invalid UTF-8');
        }
        throw error;
    }
}

/**
 * Split text into lines on '\n'. A trailing newline ends the last line
 * rather than starting an empty one, and empty text has no lines.
 */
export function splitLines(text: string): string[] {
    if (text === '') {
        return [];
    }
    const lines = text.split('\n');
    if (text.endsWith('\n')) {
        lines.pop();
    }
    return lines;
}
