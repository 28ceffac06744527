/**
 * Process Errors
 *
 * Error factories for command screening, spawning and background process lookup
 */

import { CorralRuntimeError, ErrorScope, ErrorType } from '@corral/core';
import { ProcessErrorCode } from './error-codes.js';

/**
 * Factory class for creating Process-related errors
 */
export class ProcessError {
    private constructor() {
        // Private constructor prevents instantiation
    }

    /**
     * Empty, whitespace-only or oversized command
     */
    static invalidCommand(command: string, reason: string): CorralRuntimeError {
        return new CorralRuntimeError(
            ProcessErrorCode.INVALID_COMMAND,
            ErrorScope.PROCESS,
            ErrorType.USER,
            `Invalid command: ${reason}`,
            { command: command.slice(0, 200), reason }
        );
    }

    static invalidTimeout(timeoutSeconds: number, maxTimeoutSeconds: number): CorralRuntimeError {
        return new CorralRuntimeError(
            ProcessErrorCode.INVALID_TIMEOUT,
            ErrorScope.PROCESS,
            ErrorType.USER,
            `Invalid timeout: ${timeoutSeconds}s. Must be greater than 0 and at most ${maxTimeoutSeconds}s`,
            { timeoutSeconds, maxTimeoutSeconds }
        );
    }

    /**
     * Rejected by the command policy; nothing was spawned
     */
    static commandBlocked(command: string, reason: string): CorralRuntimeError {
        return new CorralRuntimeError(
            ProcessErrorCode.COMMAND_BLOCKED,
            ErrorScope.POLICY,
            ErrorType.FORBIDDEN,
            `Command is blocked: ${reason}`,
            { command, reason },
            'Use a narrower command that does not touch system-wide state'
        );
    }

    static spawnFailed(command: string, cause: string): CorralRuntimeError {
        return new CorralRuntimeError(
            ProcessErrorCode.SPAWN_FAILED,
            ErrorScope.PROCESS,
            ErrorType.SYSTEM,
            `Failed to start command: ${cause}`,
            { command, cause }
        );
    }

    static processNotFound(handle: string): CorralRuntimeError {
        return new CorralRuntimeError(
            ProcessErrorCode.PROCESS_NOT_FOUND,
            ErrorScope.PROCESS,
            ErrorType.NOT_FOUND,
            `Background process not found: ${handle}`,
            { handle },
            'The handle may be mistyped, already collected, or evicted after the retention window'
        );
    }

    static stillRunning(handle: string): CorralRuntimeError {
        return new CorralRuntimeError(
            ProcessErrorCode.STILL_RUNNING,
            ErrorScope.PROCESS,
            ErrorType.CONFLICT,
            `Background process is still running: ${handle}`,
            { handle },
            'Use poll_command to watch progress, or kill_command to stop it'
        );
    }
}
