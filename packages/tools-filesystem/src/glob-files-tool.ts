/**
 * Glob Files Tool
 *
 * Finds files by glob pattern, newest first
 */

import { z } from 'zod';
import { defineTool } from '@corral/core';
import type { SearchDisplayData } from '@corral/core';
import type { FileStore } from './file-store.js';

const GlobFilesInputSchema = z
    .object({
        pattern: z.string().min(1).describe('Glob pattern (e.g. "**/*.ts", "src/*.json")'),
        path: z
            .string()
            .optional()
            .describe('Absolute directory to search from (defaults to the project root)'),
        max_results: z
            .number()
            .int()
            .positive()
            .optional()
            .describe('Maximum number of files to return'),
    })
    .strict();

export function createGlobFilesTool(fileStore: FileStore) {
    return defineTool({
        id: 'glob_files',
        displayName: 'Find Files',
        description:
            'Find files matching a glob pattern under an allowed directory. Results are sorted by modification time, newest first.',
        inputSchema: GlobFilesInputSchema,
        execute: async (input) => {
            const result = await fileStore.globFiles({
                pattern: input.pattern,
                path: input.path,
                maxResults: input.max_results,
            });

            const _display: SearchDisplayData = {
                type: 'search',
                pattern: input.pattern,
                matches: result.files.map((file) => ({ file: file.path, line: 0, content: file.path })),
                totalMatches: result.totalFound,
                truncated: result.truncated,
            };

            return {
                files: result.files.map((file) => ({
                    path: file.path,
                    size: file.size,
                    modified: file.modified,
                })),
                total_found: result.totalFound,
                truncated: result.truncated,
                _display,
            };
        },
    });
}
