/**
 * Write File Tool
 *
 * Creates or overwrites a file with the full content
 */

import { z } from 'zod';
import { defineTool } from '@corral/core';
import type { DiffDisplayData, FileDisplayData } from '@corral/core';
import type { FileStore } from './file-store.js';
import { generateDiffDisplay } from './diff-display.js';

const WriteFileInputSchema = z
    .object({
        path: z.string().describe('Absolute path where the file should be written'),
        content: z.string().describe('Full content of the file'),
    })
    .strict();

export function createWriteFileTool(fileStore: FileStore) {
    return defineTool({
        id: 'write_file',
        displayName: 'Write',
        description:
            'Write the full content of a file, creating it or replacing it. The parent directory must already exist. The write is atomic. Returns whether a new file was created.',
        inputSchema: WriteFileInputSchema,
        execute: async (input) => {
            const result = await fileStore.writeFile({ path: input.path, content: input.content });

            let _display: DiffDisplayData | FileDisplayData;
            if (result.previousContent !== undefined) {
                _display = generateDiffDisplay(result.path, result.previousContent, input.content);
            } else {
                _display = {
                    type: 'file',
                    path: result.path,
                    operation: result.newFileCreated ? 'create' : 'write',
                    size: result.bytesWritten,
                };
            }

            return {
                path: result.path,
                new_file_created: result.newFileCreated,
                bytes_written: result.bytesWritten,
                _display,
            };
        },
    });
}
