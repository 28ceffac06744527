import { CorralRuntimeError } from '../errors/CorralRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { PathErrorCode } from './error-codes.js';

/**
 * Path error factory. Every error here is a scope violation: the request
 * named a path the sandbox will not touch.
 */
export class PathError {
    static empty() {
        return new CorralRuntimeError(
            PathErrorCode.EMPTY,
            ErrorScope.PATH,
            ErrorType.USER,
            'Path cannot be empty'
        );
    }

    static invalid(path: string, reason: string) {
        return new CorralRuntimeError(
            PathErrorCode.INVALID,
            ErrorScope.PATH,
            ErrorType.USER,
            `Invalid path: ${reason}`,
            { path, reason }
        );
    }

    static notAbsolute(path: string) {
        return new CorralRuntimeError(
            PathErrorCode.NOT_ABSOLUTE,
            ErrorScope.PATH,
            ErrorType.USER,
            `Path must be absolute: ${path}`,
            { path },
            'Pass an absolute path under the project root'
        );
    }

    static outsideAllowedScope(path: string, resolvedPath: string, allowedRoots: readonly string[]) {
        return new CorralRuntimeError(
            PathErrorCode.OUTSIDE_ALLOWED_SCOPE,
            ErrorScope.PATH,
            ErrorType.FORBIDDEN,
            `Path is outside the allowed roots: ${path}`,
            { path, resolvedPath, allowedRoots: [...allowedRoots] },
            `Allowed roots: ${allowedRoots.join(', ')}`
        );
    }

    static notAFile(path: string) {
        return new CorralRuntimeError(
            PathErrorCode.NOT_A_FILE,
            ErrorScope.PATH,
            ErrorType.USER,
            `Path is a directory, not a file: ${path}`,
            { path }
        );
    }

    static notADirectory(path: string) {
        return new CorralRuntimeError(
            PathErrorCode.NOT_A_DIRECTORY,
            ErrorScope.PATH,
            ErrorType.USER,
            `Path is not a directory: ${path}`,
            { path }
        );
    }

    static parentMissing(path: string, parent: string) {
        return new CorralRuntimeError(
            PathErrorCode.PARENT_MISSING,
            ErrorScope.PATH,
            ErrorType.NOT_FOUND,
            `Parent directory does not exist: ${parent}`,
            { path, parent },
            'Create the parent directory first'
        );
    }

    static directoryNotFound(path: string) {
        return new CorralRuntimeError(
            PathErrorCode.DIRECTORY_NOT_FOUND,
            ErrorScope.PATH,
            ErrorType.NOT_FOUND,
            `Directory does not exist: ${path}`,
            { path }
        );
    }

    static notFound(path: string) {
        return new CorralRuntimeError(
            PathErrorCode.NOT_FOUND,
            ErrorScope.PATH,
            ErrorType.NOT_FOUND,
            `Path does not exist: ${path}`,
            { path }
        );
    }

    static inaccessible(path: string, reason: string) {
        return new CorralRuntimeError(
            PathErrorCode.INACCESSIBLE,
            ErrorScope.PATH,
            ErrorType.FORBIDDEN,
            `Cannot resolve path ${path}: ${reason}`,
            { path, reason }
        );
    }

    static invalidRoot(root: string, reason: string) {
        return new CorralRuntimeError(
            PathErrorCode.INVALID_ROOT,
            ErrorScope.PATH,
            ErrorType.USER,
            `Invalid allowed root ${root}: ${reason}`,
            { root, reason }
        );
    }
}
