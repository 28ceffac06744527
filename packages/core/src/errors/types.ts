import type { PathErrorCode } from '../filesystem/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';
import type { ToolErrorCode } from '../tools/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    PATH = 'path', // Path canonicalization and allowed-root checks
    POLICY = 'policy', // Command screening
    MATCH = 'match', // Literal text matching for edits
    FILESYSTEM = 'filesystem', // File reads, writes, search
    PROCESS = 'process', // Process spawning, lifecycle, background registry
    TOOLS = 'tools', // Tool dispatch and input validation
    CONFIG = 'config', // Configuration file operations, parsing, validation
    LOGGER = 'logger', // Logging system operations, transports, and configuration
    RUNTIME = 'runtime', // Runtime assembly and request envelopes
}

/**
 * Error types describing the nature of a failure
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // rejected by policy or scope
    NOT_FOUND = 'not_found', // resource doesn't exist (file, handle, match)
    TIMEOUT = 'timeout', // operation timed out
    CONFLICT = 'conflict', // resource state conflict (ambiguous match, still running)
    SYSTEM = 'system', // bugs, internal failures, unexpected states
    UNKNOWN = 'unknown', // unclassified errors, fallback
}

/**
 * Union type for the error codes owned by core
 * Packages built on core declare their own code enums and pass them as strings
 */
export type CorralErrorCode = PathErrorCode | LoggerErrorCode | ToolErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: CorralErrorCode | string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
