/**
 * @corral/tools-filesystem
 *
 * Literal-match file editing, paginated reads, atomic writes, glob and grep.
 */

export { fileSystemToolsFactory, FILESYSTEM_TOOL_NAMES } from './tool-factory.js';
export type { FileSystemToolName } from './tool-factory.js';
export { FileSystemToolsConfigSchema } from './tool-factory-config.js';
export type { FileSystemToolsConfig } from './tool-factory-config.js';

export { FileStore, LINE_TRUNCATION_MARKER } from './file-store.js';
export { locate, select, apply } from './text-matcher.js';
export type { Span } from './text-matcher.js';
export { decodeText, splitLines } from './text-encoding.js';
export { writeFileAtomic } from './atomic-write.js';
export { FileSystemError, MatchError } from './errors.js';
export { FileSystemErrorCode, MatchErrorCode } from './error-codes.js';

export { createReadFileTool, formatNumberedLines } from './read-file-tool.js';
export { createWriteFileTool } from './write-file-tool.js';
export { createEditFileTool } from './edit-file-tool.js';
export { createGlobFilesTool } from './glob-files-tool.js';
export { createGrepContentTool } from './grep-content-tool.js';

export type {
    ReadFileSpec,
    ReadFileResult,
    NumberedLine,
    WriteFileSpec,
    WriteFileResult,
    EditFileSpec,
    EditFileResult,
    GlobSpec,
    GlobResult,
    FileMetadata,
    SearchSpec,
    SearchResult,
    ContentMatch,
} from './types.js';
