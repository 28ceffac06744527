/**
 * Process Tools Configuration
 */

import { z } from 'zod';

/**
 * Default configuration constants for Process tools.
 * These are the single source of truth for all default values.
 */
const DEFAULT_TIMEOUT_SECONDS = 60;
const DEFAULT_MAX_TIMEOUT_SECONDS = 300;

/** No configuration may allow a command to run longer than this */
export const TIMEOUT_CEILING_SECONDS = 300;
const DEFAULT_MAX_OUTPUT_BYTES = 1 * 1024 * 1024; // 1MB per stream
const DEFAULT_RETENTION_MINUTES = 60;
const DEFAULT_MAX_COMMAND_LENGTH = 10000;
const DEFAULT_BLOCKED_COMMANDS: string[] = [];

/**
 * Services receive fully-validated config from this schema and use it as-is,
 * with no additional defaults or fallbacks needed.
 */
export const ProcessToolsConfigSchema = z
    .object({
        defaultTimeoutSeconds: z
            .number()
            .positive()
            .default(DEFAULT_TIMEOUT_SECONDS)
            .describe('Timeout applied when run_command omits timeout_seconds'),
        maxTimeoutSeconds: z
            .number()
            .positive()
            .max(TIMEOUT_CEILING_SECONDS)
            .default(DEFAULT_MAX_TIMEOUT_SECONDS)
            .describe('Largest timeout_seconds a caller may request'),
        maxOutputBytes: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_OUTPUT_BYTES)
            .describe('Bytes kept per stream; older output is dropped first'),
        retentionMinutes: z
            .number()
            .positive()
            .default(DEFAULT_RETENTION_MINUTES)
            .describe('How long a finished background process stays collectable'),
        maxCommandLength: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_COMMAND_LENGTH)
            .describe('Longest command string accepted'),
        blockedCommands: z
            .array(z.string().min(1))
            .default(DEFAULT_BLOCKED_COMMANDS)
            .describe('Extra case-insensitive substrings that block a command outright'),
    })
    .strict()
    .refine((config) => config.defaultTimeoutSeconds <= config.maxTimeoutSeconds, {
        message: 'defaultTimeoutSeconds must not exceed maxTimeoutSeconds',
        path: ['defaultTimeoutSeconds'],
    });

export type ProcessToolsConfig = z.output<typeof ProcessToolsConfigSchema>;
