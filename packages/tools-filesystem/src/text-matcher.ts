/**
 * Text Matcher
 *
 * Literal byte matching for edits. No regex, no whitespace normalization:
 * the block must appear byte-for-byte in the content.
 */

import { MatchError } from './errors.js';

/**
 * Half-open byte range [start, end) in the original content
 */
export interface Span {
    start: number;
    end: number;
}

/**
 * Every non-overlapping occurrence of `needle`, scanning left to right.
 * After a match the scan resumes at its end, so "aaa" in "aaaaaa" yields two spans.
 */
export function locate(content: Buffer, needle: Buffer): Span[] {
    if (needle.length === 0) {
        throw MatchError.emptyPattern();
    }

    const spans: Span[] = [];
    let from = 0;
    for (;;) {
        const index = content.indexOf(needle, from);
        if (index === -1) {
            return spans;
        }
        spans.push({ start: index, end: index + needle.length });
        from = index + needle.length;
    }
}

/**
 * Enforce the uniqueness contract: exactly one span, or every span when
 * `replaceAll` is set.
 *
 * @param label path or name used in error messages
 */
export function select(
    spans: readonly Span[],
    replaceAll: boolean,
    label: string,
    oldContent: string
): readonly Span[] {
    if (spans.length === 0) {
        throw MatchError.notFound(label, oldContent);
    }
    if (spans.length > 1 && !replaceAll) {
        throw MatchError.ambiguous(label, oldContent, spans.length);
    }
    return spans;
}

/**
 * Build new content by copying the bytes between spans and inserting the
 * replacement in place of each. Offsets refer to the original content.
 */
export function apply(content: Buffer, spans: readonly Span[], replacement: Buffer): Buffer {
    const parts: Buffer[] = [];
    let cursor = 0;
    for (const span of spans) {
        if (span.start < cursor || span.end > content.length || span.end < span.start) {
            throw new RangeError(`Span [${span.start}, ${span.end}) is out of order or out of bounds`);
        }
        parts.push(content.subarray(cursor, span.start), replacement);
        cursor = span.end;
    }
    parts.push(content.subarray(cursor));
    return Buffer.concat(parts);
}
