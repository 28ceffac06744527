/**
 * Run Command Tool
 *
 * Executes a shell command under the command policy, in the foreground or background
 */

import { z } from 'zod';
import { defineTool } from '@corral/core';
import type { ProcessRunner } from './process-runner.js';
import type { ProcessToolsConfig } from './tool-factory-config.js';
import { formatExecutionResult } from './result-format.js';

export function formatByteLimit(bytes: number): string {
    const mib = 1024 * 1024;
    if (bytes % mib === 0) {
        return `${bytes / mib}MB`;
    }
    if (bytes % 1024 === 0) {
        return `${bytes / 1024}KB`;
    }
    return `${bytes} bytes`;
}

const createRunCommandInputSchema = (config: ProcessToolsConfig) => z
    .object({
        command: z.string().min(1).describe('Shell command to execute'),
        working_directory: z
            .string()
            .optional()
            .describe('Absolute directory to run in (default: the project root)'),
        timeout_seconds: z
            .number()
            .positive()
            .optional()
            .describe(
                `Seconds before the process group is killed (default: ${config.defaultTimeoutSeconds}, max: ${config.maxTimeoutSeconds})`
            ),
        background: z
            .boolean()
            .optional()
            .default(false)
            .describe('Return a handle immediately instead of waiting (default: false)'),
    })
    .strict();

export function createRunCommandTool(runner: ProcessRunner, config: ProcessToolsConfig) {
    return defineTool({
        id: 'run_command',
        displayName: 'Shell',
        description: `Execute a shell command with /bin/sh and return stdout, stderr and the exit code.

- Commands run in the project root unless working_directory is given; it must be inside the allowed roots.
- A command that exceeds timeout_seconds is killed along with everything it started; the result then has timed_out=true and exit_code=124.
- Each stream keeps the last ${formatByteLimit(config.maxOutputBytes)}; earlier output is replaced by a "[... truncated N bytes]" line.
- With background=true the call returns a handle at once. Use poll_command to watch it, collect_command to get the final result, kill_command to stop it.
- Commands that would wreck the host (rm -rf /, mkfs, curl | sh, ...) are refused without running. Risky but scoped commands run with a warning.
- Each command runs in a fresh shell, so cd does not persist between calls.`,
        inputSchema: createRunCommandInputSchema(config),
        execute: async (input, { logger }) => {
            logger.debug('Launching command', {
                command: input.command,
                background: input.background,
            });
            const result = await runner.run({
                command: input.command,
                workingDirectory: input.working_directory,
                timeoutSeconds: input.timeout_seconds,
                background: input.background,
            });
            return formatExecutionResult(input.command, result);
        },
    });
}
