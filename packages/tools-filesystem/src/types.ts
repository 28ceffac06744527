/**
 * FileStore Types
 *
 * Request and result shapes for reading, writing, editing and searching files.
 */

export interface ReadFileSpec {
    /** Absolute path */
    path: string;
    /** Lines to skip before the first returned line (default 0) */
    offset?: number | undefined;
    /** Maximum lines to return (default from config) */
    limit?: number | undefined;
}

export interface NumberedLine {
    /** 1-based */
    lineNumber: number;
    text: string;
}

export interface ReadFileResult {
    /** Canonical path that was read */
    path: string;
    lines: NumberedLine[];
    totalLines: number;
    /** True when lines remain after the returned range */
    hasMore: boolean;
    /** Number of returned lines cut at maxLineLength */
    truncatedLines: number;
    size: number;
}

export interface WriteFileSpec {
    path: string;
    content: string;
}

export interface WriteFileResult {
    path: string;
    newFileCreated: boolean;
    bytesWritten: number;
    /** Previous content when an existing file was overwritten */
    previousContent?: string | undefined;
}

export interface EditFileSpec {
    path: string;
    oldContent: string;
    newContent: string;
    replaceAll?: boolean | undefined;
}

export interface EditFileResult {
    path: string;
    /** Bytes removed plus bytes inserted across all replacements */
    bytesChanged: number;
    replacements: number;
    originalContent: string;
    newContent: string;
}

export interface GlobSpec {
    pattern: string;
    /** Directory to search from (default: project root) */
    path?: string | undefined;
    maxResults?: number | undefined;
}

export interface FileMetadata {
    path: string;
    size: number;
    /** ISO timestamp */
    modified: string;
}

export interface GlobResult {
    /** Newest first */
    files: FileMetadata[];
    totalFound: number;
    truncated: boolean;
}

export interface SearchSpec {
    /** Regular expression matched against each line */
    pattern: string;
    /** File or directory to search (default: project root) */
    path?: string | undefined;
    /** Glob filter for files under a directory (default: all files) */
    glob?: string | undefined;
    caseInsensitive?: boolean | undefined;
    contextLines?: number | undefined;
    maxResults?: number | undefined;
}

export interface ContentMatch {
    file: string;
    lineNumber: number;
    line: string;
    context?: { before: string[]; after: string[] };
}

export interface SearchResult {
    matches: ContentMatch[];
    filesSearched: number;
    truncated: boolean;
}
