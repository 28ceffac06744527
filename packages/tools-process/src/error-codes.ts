/**
 * Process error codes
 */
export enum ProcessErrorCode {
    // Screening
    INVALID_COMMAND = 'process_invalid_command',
    INVALID_TIMEOUT = 'process_invalid_timeout',
    COMMAND_BLOCKED = 'process_command_blocked',

    // Execution
    SPAWN_FAILED = 'process_spawn_failed',

    // Background registry
    PROCESS_NOT_FOUND = 'process_not_found',
    STILL_RUNNING = 'process_still_running',
}
