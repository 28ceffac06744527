/**
 * FileStore
 *
 * Paginated reads, atomic writes, and literal-match edits under the allowed
 * roots. Every operation resolves its path through the PathGuard first.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Stats } from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import { glob } from 'glob';
import safeRegex from 'safe-regex';
import {
    CorralLogComponent,
    CorralRuntimeError,
    PathError,
    hasErrorCode,
    type Logger,
    type PathGuard,
} from '@corral/core';
import type { FileSystemToolsConfig } from './tool-factory-config.js';
import { FileSystemError, MatchError } from './errors.js';
import { decodeText, splitLines } from './text-encoding.js';
import { locate, select, apply } from './text-matcher.js';
import { writeFileAtomic } from './atomic-write.js';
import type {
    ContentMatch,
    EditFileResult,
    EditFileSpec,
    FileMetadata,
    GlobResult,
    GlobSpec,
    NumberedLine,
    ReadFileResult,
    ReadFileSpec,
    SearchResult,
    SearchSpec,
    WriteFileResult,
    WriteFileSpec,
} from './types.js';

export const LINE_TRUNCATION_MARKER = '... [truncated]';

/** Files scanned by one search before giving up on finding more */
const MAX_SEARCH_FILES = 10000;

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function isPermissionError(error: unknown): boolean {
    return hasErrorCode(error, 'EACCES', 'EPERM', 'EROFS');
}

export class FileStore {
    private readonly logger: Logger;

    /**
     * @param config Fully-validated configuration; defaults already applied.
     * @param defaultDirectory Search root when glob/grep omit a path.
     */
    constructor(
        private readonly config: FileSystemToolsConfig,
        private readonly pathGuard: PathGuard,
        logger: Logger,
        private readonly defaultDirectory: string
    ) {
        this.logger = logger.createChild(CorralLogComponent.FILESYSTEM);
    }

    /**
     * Read a text file as numbered lines [offset+1, offset+limit].
     * An offset at or past the end yields an empty list.
     */
    async readFile(spec: ReadFileSpec): Promise<ReadFileResult> {
        const offset = spec.offset ?? 0;
        const limit = spec.limit ?? this.config.defaultReadLimit;
        if (!Number.isInteger(offset) || offset < 0 || !Number.isInteger(limit) || limit <= 0) {
            throw FileSystemError.invalidReadRange(offset, limit);
        }

        const resolved = await this.pathGuard.resolve(spec.path, 'file');
        const { buffer, stats } = await this.loadFile(resolved, spec.path);
        const text = decodeText(buffer, spec.path);
        const allLines = splitLines(text);

        const lines: NumberedLine[] = [];
        let truncatedLines = 0;
        const end = Math.min(allLines.length, offset + limit);
        for (let index = offset; index < end; index++) {
            let lineText = allLines[index] ?? '';
            if (lineText.endsWith('\r')) {
                lineText = lineText.slice(0, -1);
            }
            if (lineText.length > this.config.maxLineLength) {
                lineText = lineText.slice(0, this.config.maxLineLength) + LINE_TRUNCATION_MARKER;
                truncatedLines++;
            }
            lines.push({ lineNumber: index + 1, text: lineText });
        }

        this.logger.debug(`Read ${lines.length} of ${allLines.length} lines from ${resolved}`);

        return {
            path: resolved,
            lines,
            totalLines: allLines.length,
            hasMore: end < allLines.length,
            truncatedLines,
            size: stats.size,
        };
    }

    /**
     * Create or overwrite a file with the full content, atomically.
     */
    async writeFile(spec: WriteFileSpec): Promise<WriteFileResult> {
        const resolved = await this.pathGuard.resolve(spec.path, 'file');
        const existing = await this.statIfExists(resolved, spec.path);

        if (existing && !existing.isFile()) {
            throw PathError.notAFile(spec.path);
        }

        let previousContent: string | undefined;
        if (existing) {
            try {
                await fs.access(resolved, fsConstants.W_OK);
            } catch (error) {
                throw FileSystemError.notWritable(spec.path, errorMessage(error));
            }
            previousContent = await this.readPreviousContent(resolved, existing);
        }

        const data = Buffer.from(spec.content, 'utf8');
        await this.commit(resolved, spec.path, data, existing?.mode);

        this.logger.debug(
            `${existing ? 'Overwrote' : 'Created'} ${resolved} (${data.length} bytes)`
        );

        return {
            path: resolved,
            newFileCreated: !existing,
            bytesWritten: data.length,
            previousContent,
        };
    }

    /**
     * Replace a literal block: exactly one occurrence, or every occurrence
     * with `replaceAll`. A failed edit leaves the file untouched.
     */
    async editFile(spec: EditFileSpec): Promise<EditFileResult> {
        if (spec.oldContent.length === 0) {
            throw MatchError.emptyPattern();
        }

        const resolved = await this.pathGuard.resolve(spec.path, 'file');
        const { buffer, stats } = await this.loadFile(resolved, spec.path);
        const originalContent = decodeText(buffer, spec.path);

        const needle = Buffer.from(spec.oldContent, 'utf8');
        const replacement = Buffer.from(spec.newContent, 'utf8');
        const spans = select(
            locate(buffer, needle),
            spec.replaceAll ?? false,
            spec.path,
            spec.oldContent
        );
        const updated = apply(buffer, spans, replacement);

        await this.commit(resolved, spec.path, updated, stats.mode);

        const bytesChanged = spans.length * (needle.length + replacement.length);
        this.logger.debug(
            `Edited ${resolved}: ${spans.length} replacement(s), ${bytesChanged} bytes changed`
        );

        return {
            path: resolved,
            bytesChanged,
            replacements: spans.length,
            originalContent,
            newContent: decodeText(updated, spec.path),
        };
    }

    /**
     * Files matching a glob pattern under an allowed directory, newest first.
     */
    async globFiles(spec: GlobSpec): Promise<GlobResult> {
        const cwd = await this.pathGuard.resolve(spec.path ?? this.defaultDirectory, 'directory');
        const maxResults = spec.maxResults ?? this.config.maxGlobResults;

        let matches: string[];
        try {
            matches = await glob(spec.pattern, {
                cwd,
                absolute: true,
                nodir: true,
                follow: false,
            });
        } catch (error) {
            throw FileSystemError.globFailed(spec.pattern, errorMessage(error));
        }

        const files: FileMetadata[] = [];
        for (const match of matches) {
            const canonical = await this.pathGuard.canonicalize(match);
            if (!this.pathGuard.allowedRoots.contains(canonical)) {
                this.logger.debug(`Skipping glob match outside allowed roots: ${match}`);
                continue;
            }
            try {
                const stats = await fs.stat(canonical);
                files.push({
                    path: match,
                    size: stats.size,
                    modified: stats.mtime.toISOString(),
                });
            } catch (error) {
                this.logger.debug(`Failed to stat ${match}: ${errorMessage(error)}`);
            }
        }

        files.sort((a, b) => b.modified.localeCompare(a.modified) || a.path.localeCompare(b.path));

        return {
            files: files.slice(0, maxResults),
            totalFound: files.length,
            truncated: files.length > maxResults,
        };
    }

    /**
     * Line-wise regex search over text files. Binary and oversized files are skipped.
     */
    async searchContent(spec: SearchSpec): Promise<SearchResult> {
        let regex: RegExp;
        try {
            regex = new RegExp(spec.pattern, spec.caseInsensitive ? 'i' : '');
        } catch (error) {
            throw FileSystemError.invalidPattern(spec.pattern, errorMessage(error));
        }
        if (!safeRegex(spec.pattern)) {
            throw FileSystemError.invalidPattern(
                spec.pattern,
                'Pattern may cause catastrophic backtracking. Simplify the regex.'
            );
        }

        const target = await this.pathGuard.resolve(spec.path ?? this.defaultDirectory, 'existing');
        const maxResults = spec.maxResults ?? this.config.maxSearchResults;
        const contextLines = spec.contextLines ?? 0;

        let candidates: string[];
        const targetStats = await fs.stat(target);
        if (targetStats.isFile()) {
            candidates = [target];
        } else {
            const found = await this.globFiles({
                pattern: spec.glob ?? '**/*',
                path: target,
                maxResults: MAX_SEARCH_FILES,
            });
            candidates = found.files.map((f) => f.path).sort();
        }

        const matches: ContentMatch[] = [];
        let filesSearched = 0;

        for (const file of candidates) {
            let lines: string[];
            try {
                const { buffer } = await this.loadFile(file, file);
                lines = splitLines(decodeText(buffer, file));
            } catch (error) {
                if (error instanceof CorralRuntimeError) {
                    this.logger.debug(`Skipping ${file}: ${error.message}`);
                    continue;
                }
                throw FileSystemError.searchFailed(spec.pattern, errorMessage(error));
            }
            filesSearched++;

            for (let i = 0; i < lines.length; i++) {
                const line = lines[i] ?? '';
                if (!regex.test(line)) {
                    continue;
                }

                const match: ContentMatch = { file, lineNumber: i + 1, line };
                if (contextLines > 0) {
                    match.context = {
                        before: lines.slice(Math.max(0, i - contextLines), i),
                        after: lines.slice(i + 1, i + 1 + contextLines),
                    };
                }
                matches.push(match);

                if (matches.length >= maxResults) {
                    return { matches, filesSearched, truncated: true };
                }
            }
        }

        return { matches, filesSearched, truncated: false };
    }

    private async statIfExists(resolved: string, displayPath: string): Promise<Stats | undefined> {
        try {
            return await fs.stat(resolved);
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                return undefined;
            }
            throw FileSystemError.readFailed(displayPath, errorMessage(error));
        }
    }

    /**
     * Load a regular file within the size limit
     */
    private async loadFile(
        resolved: string,
        displayPath: string
    ): Promise<{ buffer: Buffer; stats: Stats }> {
        const stats = await this.statIfExists(resolved, displayPath);
        if (!stats) {
            throw FileSystemError.fileNotFound(displayPath);
        }
        if (!stats.isFile()) {
            throw PathError.notAFile(displayPath);
        }
        if (stats.size > this.config.maxFileSize) {
            throw FileSystemError.fileTooLarge(displayPath, stats.size, this.config.maxFileSize);
        }

        try {
            return { buffer: await fs.readFile(resolved), stats };
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                throw FileSystemError.fileNotFound(displayPath);
            }
            throw FileSystemError.readFailed(displayPath, errorMessage(error));
        }
    }

    /**
     * Previous content of a file about to be overwritten, for diff display.
     * Binary, unreadable or oversized files have none.
     */
    private async readPreviousContent(resolved: string, stats: Stats): Promise<string | undefined> {
        if (stats.size > this.config.maxFileSize) {
            return undefined;
        }
        try {
            return decodeText(await fs.readFile(resolved), resolved);
        } catch (error) {
            this.logger.debug(`No previous content for ${resolved}: ${errorMessage(error)}`);
            return undefined;
        }
    }

    private async commit(
        resolved: string,
        displayPath: string,
        data: Buffer,
        mode: number | undefined
    ): Promise<void> {
        try {
            await writeFileAtomic(resolved, data, { mode });
        } catch (error) {
            if (isPermissionError(error)) {
                throw FileSystemError.notWritable(displayPath, errorMessage(error));
            }
            if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
                throw PathError.parentMissing(displayPath, path.dirname(resolved));
            }
            throw FileSystemError.writeFailed(displayPath, errorMessage(error));
        }
    }
}
