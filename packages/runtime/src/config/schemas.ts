import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ErrorScope, LoggerConfigSchema, ok, fail, zodToIssues } from '@corral/core';
import type { Result } from '@corral/core';
import { ProcessToolsConfigSchema } from '@corral/tools-process';
import { FileSystemToolsConfigSchema } from '@corral/tools-filesystem';

export const DEFAULT_SCRATCH_ROOT = path.join(os.tmpdir(), 'corral');

const AbsolutePathSchema = z
    .string()
    .min(1)
    .refine((value) => path.isAbsolute(value), { message: 'Must be an absolute path' });

/**
 * Top-level sandbox configuration. Each tool package owns its section's
 * schema and defaults; this schema only composes them.
 */
export const SandboxConfigSchema = z
    .object({
        projectRoot: AbsolutePathSchema.default(() => process.cwd()).describe(
            'Directory commands and file operations default to (defaults to the working directory)'
        ),
        scratchRoot: AbsolutePathSchema.default(DEFAULT_SCRATCH_ROOT).describe(
            'Second allowed root for temporary work, created on startup'
        ),
        logger: LoggerConfigSchema.default({}),
        process: ProcessToolsConfigSchema.default({}),
        filesystem: FileSystemToolsConfigSchema.default({}),
    })
    .strict()
    .describe('Sandbox configuration');

export type SandboxConfig = z.output<typeof SandboxConfigSchema>;
export type SandboxConfigInput = z.input<typeof SandboxConfigSchema>;

export function validateSandboxConfig(raw: unknown): Result<SandboxConfig> {
    const parsed = SandboxConfigSchema.safeParse(raw);
    if (!parsed.success) {
        return fail(zodToIssues(parsed.error, 'error', ErrorScope.CONFIG));
    }
    return ok(parsed.data);
}
