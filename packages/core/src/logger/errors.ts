import { CorralRuntimeError } from '../errors/CorralRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

export class LoggerError {
    private constructor() {}

    /**
     * The log directory could not be created or the existing file could not be inspected.
     */
    static fileSinkUnavailable(logPath: string, cause: unknown): CorralRuntimeError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new CorralRuntimeError(
            LoggerErrorCode.FILE_SINK_UNAVAILABLE,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Cannot log to ${logPath}: ${reason}`,
            { path: logPath, reason },
            'Point the file transport at a writable location or remove it'
        );
    }
}
