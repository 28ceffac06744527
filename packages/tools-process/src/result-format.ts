import type { ShellDisplayData } from '@corral/core';
import type { BackgroundProcessSnapshot, ExecutionResult } from './types.js';

/**
 * Wire shape of an ExecutionResult
 */
export function formatExecutionResult(command: string, result: ExecutionResult) {
    const isLaunch = result.handle !== undefined && result.exitCode === undefined;
    const _display: ShellDisplayData = {
        type: 'shell',
        command,
        ...(result.exitCode !== undefined && { exitCode: result.exitCode }),
        duration: result.durationMs,
        isBackground: result.handle !== undefined,
        ...(!isLaunch && { stdout: result.stdout, stderr: result.stderr }),
    };

    return {
        stdout: result.stdout,
        stderr: result.stderr,
        ...(result.exitCode !== undefined && { exit_code: result.exitCode }),
        success: result.success,
        ...(result.handle !== undefined && { handle: result.handle }),
        timed_out: result.timedOut,
        truncated: result.truncated,
        duration_ms: result.durationMs,
        ...(result.warning !== undefined && { warning: result.warning }),
        _display,
    };
}

/**
 * Wire shape of a BackgroundProcessSnapshot
 */
export function formatSnapshot(snapshot: BackgroundProcessSnapshot) {
    return {
        handle: snapshot.handle,
        ...(snapshot.pid !== undefined && { pid: snapshot.pid }),
        command: snapshot.command,
        cwd: snapshot.cwd,
        state: snapshot.state,
        started_at: snapshot.startedAt,
        ...(snapshot.completedAt !== undefined && { completed_at: snapshot.completedAt }),
        ...(snapshot.exitCode !== undefined && { exit_code: snapshot.exitCode }),
        stdout: snapshot.stdout,
        stderr: snapshot.stderr,
        truncated: snapshot.truncated,
        timed_out: snapshot.timedOut,
        duration_ms: snapshot.durationMs,
    };
}
