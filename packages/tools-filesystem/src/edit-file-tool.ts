/**
 * Edit File Tool
 *
 * Replaces an exact block of text in a file
 */

import { z } from 'zod';
import { defineTool } from '@corral/core';
import type { FileStore } from './file-store.js';
import { generateDiffDisplay } from './diff-display.js';

const EditFileInputSchema = z
    .object({
        path: z.string().describe('Absolute path to the file to edit'),
        old_content: z
            .string()
            .min(1)
            .describe('Exact text to replace (must occur once unless replace_all is true)'),
        new_content: z.string().describe('Replacement text'),
        replace_all: z
            .boolean()
            .optional()
            .default(false)
            .describe('Replace every occurrence (default: false, requires a unique match)'),
    })
    .strict()
    .refine((input) => input.old_content !== input.new_content, {
        message: 'new_content must differ from old_content',
        path: ['new_content'],
    });

export function createEditFileTool(fileStore: FileStore) {
    return defineTool({
        id: 'edit_file',
        displayName: 'Update',
        description:
            'Edit a file by replacing an exact block of text. By default old_content must occur exactly once; if it occurs several times the edit fails with the count, so include more surrounding lines or set replace_all=true. Matching is literal, including whitespace and line endings.',
        inputSchema: EditFileInputSchema,
        execute: async (input) => {
            const result = await fileStore.editFile({
                path: input.path,
                oldContent: input.old_content,
                newContent: input.new_content,
                replaceAll: input.replace_all,
            });

            return {
                path: result.path,
                bytes_changed: result.bytesChanged,
                replacements: result.replacements,
                _display: generateDiffDisplay(result.path, result.originalContent, result.newContent),
            };
        },
    });
}
