/**
 * Runtime-specific error codes
 * Covers request envelopes and runtime lifecycle
 */
export enum SandboxErrorCode {
    // Request envelope
    MALFORMED_JSON = 'runtime_malformed_json',
    INVALID_REQUEST = 'runtime_invalid_request',

    // Lifecycle
    SHUT_DOWN = 'runtime_shut_down',
    OPERATION_TABLE_MISMATCH = 'runtime_operation_table_mismatch',
}
