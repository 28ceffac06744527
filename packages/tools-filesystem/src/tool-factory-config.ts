/**
 * FileSystem Tools Configuration
 */

import { z } from 'zod';

/**
 * Default configuration constants for FileSystem tools.
 * These are the single source of truth for all default values.
 */
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
const DEFAULT_MAX_LINE_LENGTH = 2000;
const DEFAULT_READ_LIMIT = 2000;
const DEFAULT_MAX_GLOB_RESULTS = 1000;
const DEFAULT_MAX_SEARCH_RESULTS = 100;

/**
 * Services receive fully-validated config from this schema and use it as-is,
 * with no additional defaults or fallbacks needed.
 */
export const FileSystemToolsConfigSchema = z
    .object({
        maxFileSize: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_FILE_SIZE)
            .describe('Largest file, in bytes, that read, edit or search will load'),
        maxLineLength: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_LINE_LENGTH)
            .describe('Lines longer than this are cut in read_file output'),
        defaultReadLimit: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_READ_LIMIT)
            .describe('Lines returned by read_file when no limit is given'),
        maxGlobResults: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_GLOB_RESULTS)
            .describe('Upper bound on files returned by glob_files'),
        maxSearchResults: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_SEARCH_RESULTS)
            .describe('Upper bound on matches returned by grep_content'),
    })
    .strict();

export type FileSystemToolsConfig = z.output<typeof FileSystemToolsConfigSchema>;
