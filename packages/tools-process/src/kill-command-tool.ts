/**
 * Kill Command Tool
 *
 * Terminates a background process and everything it started
 */

import { z } from 'zod';
import { defineTool } from '@corral/core';
import type { ProcessRunner } from './process-runner.js';
import { formatSnapshot } from './result-format.js';

const KillCommandInputSchema = z
    .object({
        handle: z.string().min(1).describe('Handle of the background process to terminate'),
    })
    .strict();

export function createKillCommandTool(runner: ProcessRunner) {
    return defineTool({
        id: 'kill_command',
        displayName: 'Kill',
        description:
            "Terminate a background process started by run_command. Sends SIGTERM to its process group, then SIGKILL if it hasn't exited within 200ms. Killing a process that already finished changes nothing. Returns the process state afterwards.",
        inputSchema: KillCommandInputSchema,
        execute: async (input) => formatSnapshot(await runner.kill(input.handle)),
    });
}
