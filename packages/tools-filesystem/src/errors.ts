import { CorralRuntimeError, ErrorScope, ErrorType } from '@corral/core';
import { FileSystemErrorCode, MatchErrorCode } from './error-codes.js';

export class FileSystemError {
    private constructor() {}

    static fileNotFound(path: string): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.FILE_NOT_FOUND,
            ErrorScope.FILESYSTEM,
            ErrorType.NOT_FOUND,
            `File not found: ${path}`,
            { path },
            'Check the path with glob_files; write_file creates new files'
        );
    }

    /**
     * File is binary or not valid UTF-8
     */
    static notText(path: string, reason: string): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.NOT_TEXT,
            ErrorScope.FILESYSTEM,
            ErrorType.USER,
            `File is not a text file: ${path} (${reason})`,
            { path, reason },
            'Only UTF-8 text files can be read or edited'
        );
    }

    static notWritable(path: string, cause: string): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.NOT_WRITABLE,
            ErrorScope.FILESYSTEM,
            ErrorType.FORBIDDEN,
            `Cannot write ${path}: ${cause}`,
            { path, cause }
        );
    }

    static fileTooLarge(path: string, size: number, maxSize: number): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.FILE_TOO_LARGE,
            ErrorScope.FILESYSTEM,
            ErrorType.USER,
            `File too large: ${path} (${size} bytes, max: ${maxSize} bytes)`,
            { path, size, maxSize },
            'Use grep_content to locate the relevant lines instead of reading the whole file'
        );
    }

    static invalidReadRange(offset: number, limit: number): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.INVALID_READ_RANGE,
            ErrorScope.FILESYSTEM,
            ErrorType.USER,
            `Invalid read range: offset=${offset}, limit=${limit}`,
            { offset, limit },
            'offset is a 0-based line index and limit a positive line count'
        );
    }

    static readFailed(path: string, cause: string): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.READ_FAILED,
            ErrorScope.FILESYSTEM,
            ErrorType.SYSTEM,
            `Failed to read file: ${path}: ${cause}`,
            { path, cause }
        );
    }

    static writeFailed(path: string, cause: string): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.WRITE_FAILED,
            ErrorScope.FILESYSTEM,
            ErrorType.SYSTEM,
            `Failed to write file: ${path}: ${cause}`,
            { path, cause }
        );
    }

    static globFailed(pattern: string, cause: string): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.GLOB_FAILED,
            ErrorScope.FILESYSTEM,
            ErrorType.SYSTEM,
            `Glob operation failed for pattern '${pattern}': ${cause}`,
            { pattern, cause }
        );
    }

    static searchFailed(pattern: string, cause: string): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.SEARCH_FAILED,
            ErrorScope.FILESYSTEM,
            ErrorType.SYSTEM,
            `Search operation failed for pattern '${pattern}': ${cause}`,
            { pattern, cause }
        );
    }

    static invalidPattern(pattern: string, cause: string): CorralRuntimeError {
        return new CorralRuntimeError(
            FileSystemErrorCode.INVALID_PATTERN,
            ErrorScope.FILESYSTEM,
            ErrorType.USER,
            `Invalid pattern '${pattern}': ${cause}`,
            { pattern, cause }
        );
    }
}

function preview(text: string): string {
    return text.length > 50 ? `${text.slice(0, 50)}...` : text;
}

/**
 * Match failures are always recoverable: the caller re-reads the file
 * and supplies a block that occurs exactly once.
 */
export class MatchError {
    private constructor() {}

    static notFound(path: string, oldContent: string): CorralRuntimeError {
        return new CorralRuntimeError(
            MatchErrorCode.NOT_FOUND,
            ErrorScope.MATCH,
            ErrorType.NOT_FOUND,
            `Text not found in ${path}: "${preview(oldContent)}"`,
            { path, oldContentPreview: oldContent.slice(0, 100) },
            'Read the file again and copy the exact text, including whitespace and line endings'
        );
    }

    static ambiguous(path: string, oldContent: string, count: number): CorralRuntimeError {
        return new CorralRuntimeError(
            MatchErrorCode.AMBIGUOUS,
            ErrorScope.MATCH,
            ErrorType.CONFLICT,
            `Text found ${count} times in ${path}: "${preview(oldContent)}"`,
            { path, count, oldContentPreview: oldContent.slice(0, 100) },
            [
                'Include more surrounding lines so the text occurs exactly once',
                'Or set replace_all to replace every occurrence',
            ]
        );
    }

    static emptyPattern(): CorralRuntimeError {
        return new CorralRuntimeError(
            MatchErrorCode.EMPTY_PATTERN,
            ErrorScope.MATCH,
            ErrorType.USER,
            'Text to replace must not be empty'
        );
    }
}
