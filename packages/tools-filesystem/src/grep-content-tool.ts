/**
 * Grep Content Tool
 *
 * Searches file contents with a regular expression
 */

import { z } from 'zod';
import { defineTool } from '@corral/core';
import type { SearchDisplayData } from '@corral/core';
import type { FileStore } from './file-store.js';

const GrepContentInputSchema = z
    .object({
        pattern: z.string().min(1).describe('Regular expression pattern to search for'),
        path: z
            .string()
            .optional()
            .describe('Absolute file or directory to search (defaults to the project root)'),
        glob: z
            .string()
            .optional()
            .describe('Glob pattern to filter files (e.g., "**/*.ts")'),
        context_lines: z
            .number()
            .int()
            .min(0)
            .max(20)
            .optional()
            .default(0)
            .describe('Lines of context before and after each match (default: 0)'),
        case_insensitive: z
            .boolean()
            .optional()
            .default(false)
            .describe('Perform case-insensitive search (default: false)'),
        max_results: z
            .number()
            .int()
            .positive()
            .optional()
            .describe('Maximum number of matches to return'),
    })
    .strict();

export function createGrepContentTool(fileStore: FileStore) {
    return defineTool({
        id: 'grep_content',
        displayName: 'Search Files',
        description:
            'Search text files for a regular expression, line by line. Returns file path, line number and optional context lines. Use glob to filter file types. Binary files are skipped.',
        inputSchema: GrepContentInputSchema,
        execute: async (input) => {
            const result = await fileStore.searchContent({
                pattern: input.pattern,
                path: input.path,
                glob: input.glob,
                caseInsensitive: input.case_insensitive,
                contextLines: input.context_lines,
                maxResults: input.max_results,
            });

            const _display: SearchDisplayData = {
                type: 'search',
                pattern: input.pattern,
                matches: result.matches.map((m) => ({
                    file: m.file,
                    line: m.lineNumber,
                    content: m.line,
                    ...(m.context && { context: [...m.context.before, ...m.context.after] }),
                })),
                totalMatches: result.matches.length,
                truncated: result.truncated,
            };

            return {
                matches: result.matches.map((m) => ({
                    file: m.file,
                    line_number: m.lineNumber,
                    line: m.line,
                    ...(m.context && { context: m.context }),
                })),
                files_searched: result.filesSearched,
                truncated: result.truncated,
                _display,
            };
        },
    });
}
