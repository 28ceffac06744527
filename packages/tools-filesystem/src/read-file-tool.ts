/**
 * Read File Tool
 *
 * Reads a text file as numbered lines with offset/limit pagination
 */

import { z } from 'zod';
import { defineTool } from '@corral/core';
import type { FileDisplayData } from '@corral/core';
import type { FileStore } from './file-store.js';

const ReadFileInputSchema = z
    .object({
        path: z.string().describe('Absolute path to the file to read'),
        offset: z
            .number()
            .int()
            .min(0)
            .optional()
            .describe('Number of lines to skip before reading (default: 0)'),
        limit: z
            .number()
            .int()
            .positive()
            .optional()
            .describe('Maximum number of lines to return (default: 2000)'),
    })
    .strict();

/**
 * Render lines the way `cat -n` does: right-aligned number, tab, text
 */
export function formatNumberedLines(lines: ReadonlyArray<{ lineNumber: number; text: string }>): string {
    return lines.map((l) => `${String(l.lineNumber).padStart(6)}\t${l.text}`).join('\n');
}

export function createReadFileTool(fileStore: FileStore) {
    return defineTool({
        id: 'read_file',
        displayName: 'Read',
        description:
            'Read a text file as numbered lines. Use offset (lines to skip) and limit (lines to return) to page through large files. Binary files are rejected. Paths must be absolute and inside the allowed roots.',
        inputSchema: ReadFileInputSchema,
        execute: async (input) => {
            const result = await fileStore.readFile({
                path: input.path,
                offset: input.offset,
                limit: input.limit,
            });

            const _display: FileDisplayData = {
                type: 'file',
                path: result.path,
                operation: 'read',
                size: result.size,
                lineCount: result.lines.length,
            };

            return {
                path: result.path,
                content: formatNumberedLines(result.lines),
                lines: result.lines.map((l) => ({ line_number: l.lineNumber, text: l.text })),
                total_lines: result.totalLines,
                has_more: result.hasMore,
                truncated_lines: result.truncatedLines,
                _display,
            };
        },
    });
}
