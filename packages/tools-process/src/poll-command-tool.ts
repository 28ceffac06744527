/**
 * Poll Command Tool
 *
 * Reports state and output so far of a background process
 */

import { z } from 'zod';
import { defineTool } from '@corral/core';
import type { ProcessRunner } from './process-runner.js';
import { formatSnapshot } from './result-format.js';

const PollCommandInputSchema = z
    .object({
        handle: z.string().min(1).describe('Handle returned by run_command with background=true'),
    })
    .strict();

export function createPollCommandTool(runner: ProcessRunner) {
    return defineTool({
        id: 'poll_command',
        displayName: 'Shell Status',
        description:
            'Check a background process started by run_command. Returns its state (running, completed, failed, killed), the exit code once finished, and all output captured so far. Polling does not consume output.',
        inputSchema: PollCommandInputSchema,
        execute: (input) => formatSnapshot(runner.poll(input.handle)),
    });
}
