/**
 * Process Runner Types
 *
 * Request, result and snapshot shapes for command execution
 */

/**
 * Outcome of screening a command
 */
export type PolicyDecision =
    | { kind: 'allowed' }
    | { kind: 'blocked'; reason: string }
    | { kind: 'warn'; reason: string };

export interface ExecutionRequest {
    command: string;
    /** Absolute directory under an allowed root (default: project root) */
    workingDirectory?: string | undefined;
    /** Seconds before the process group is killed (default from config) */
    timeoutSeconds?: number | undefined;
    /** Return a handle immediately instead of waiting for exit */
    background?: boolean | undefined;
}

/**
 * Result of a finished command, or of a background launch.
 * A launch carries `handle`, has no `exitCode`, and reports `success: true`.
 */
export interface ExecutionResult {
    readonly stdout: string;
    readonly stderr: string;
    /** 124 after a timeout, 128 + n after death by signal n */
    readonly exitCode?: number;
    readonly success: boolean;
    readonly handle?: string;
    readonly timedOut: boolean;
    readonly truncated: boolean;
    readonly durationMs: number;
    /** Reason the policy flagged the command, when it ran anyway */
    readonly warning?: string;
}

export type BackgroundProcessState = 'running' | 'completed' | 'failed' | 'killed';

/**
 * Read-only view of a background process at one point in time
 */
export interface BackgroundProcessSnapshot {
    readonly handle: string;
    readonly pid?: number;
    readonly command: string;
    readonly cwd: string;
    readonly state: BackgroundProcessState;
    /** ISO timestamp */
    readonly startedAt: string;
    readonly completedAt?: string;
    readonly exitCode?: number;
    readonly stdout: string;
    readonly stderr: string;
    readonly truncated: boolean;
    readonly timedOut: boolean;
    readonly durationMs: number;
}
