import * as path from 'node:path';
import { z } from 'zod';
import { LogLevelSchema } from '@corral/core';
import type { SandboxConfigOverrides } from '@corral/runtime';

/**
 * Options shared by every command, plus the per-command `--pretty` flag
 * that `optsWithGlobals()` merges in
 */
export const GlobalOptionsSchema = z
    .object({
        config: z.string().min(1, 'Config path must not be empty').optional(),
        projectRoot: z.string().min(1, 'Project root must not be empty').optional(),
        scratchRoot: z.string().min(1, 'Scratch root must not be empty').optional(),
        logLevel: LogLevelSchema.optional(),
        pretty: z.boolean().optional().default(false),
    });

export type GlobalOptions = z.output<typeof GlobalOptionsSchema>;

/**
 * Validate commander's option bag.
 * @throws {z.ZodError} If validation fails.
 */
export function parseGlobalOptions(opts: unknown): GlobalOptions {
    return GlobalOptionsSchema.parse(opts);
}

/**
 * Directories given on the command line are relative to the working directory
 */
export function toConfigOverrides(options: GlobalOptions, cwd: string): SandboxConfigOverrides {
    return {
        projectRoot: options.projectRoot !== undefined ? path.resolve(cwd, options.projectRoot) : undefined,
        scratchRoot: options.scratchRoot !== undefined ? path.resolve(cwd, options.scratchRoot) : undefined,
        logLevel: options.logLevel,
    };
}
