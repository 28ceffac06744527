/**
 * Tools-specific error codes
 */
export enum ToolErrorCode {
    // Execution
    EXECUTION_FAILED = 'tools_execution_failed',

    // Tool management
    TOOL_NOT_FOUND = 'tools_unknown_operation',
    TOOL_INVALID_ARGS = 'tools_invalid_input',
    TOOL_ALREADY_REGISTERED = 'tools_already_registered',
}
