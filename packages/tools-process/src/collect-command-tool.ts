/**
 * Collect Command Tool
 *
 * Returns the final result of a finished background process and releases it
 */

import { z } from 'zod';
import { defineTool } from '@corral/core';
import type { ProcessRunner } from './process-runner.js';
import { formatExecutionResult } from './result-format.js';

const CollectCommandInputSchema = z
    .object({
        handle: z.string().min(1).describe('Handle returned by run_command with background=true'),
    })
    .strict();

export function createCollectCommandTool(runner: ProcessRunner) {
    return defineTool({
        id: 'collect_command',
        displayName: 'Shell Result',
        description:
            'Get the final stdout, stderr and exit code of a finished background process. Fails while the process is still running. The handle is released afterwards and cannot be polled again.',
        inputSchema: CollectCommandInputSchema,
        execute: (input) => {
            const command = runner.poll(input.handle).command;
            return formatExecutionResult(command, runner.collect(input.handle));
        },
    });
}
