import { z } from 'zod';
import { LOG_LEVELS } from './types.js';

export const LogLevelSchema = z.enum(LOG_LEVELS);

const SilentTransportSchema = z.object({ type: z.literal('silent') }).strict();

const ConsoleTransportSchema = z
    .object({
        type: z.literal('console'),
        colorize: z.boolean().default(true),
        stream: z
            .enum(['auto', 'stderr'])
            .default('auto')
            .describe("'auto' writes info and below to stdout; 'stderr' writes everything to stderr"),
    })
    .strict();

const FileTransportSchema = z
    .object({
        type: z.literal('file'),
        path: z.string().min(1).describe('Log file path; rotated copies get a numeric suffix'),
        maxSize: z.number().int().positive().default(10 * 1024 * 1024),
        maxFiles: z.number().int().positive().default(5),
    })
    .strict();

export const LoggerTransportSchema = z.discriminatedUnion('type', [
    SilentTransportSchema,
    ConsoleTransportSchema,
    FileTransportSchema,
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

/**
 * Sandbox logging. Defaults to errors only, on the console.
 */
export const LoggerConfigSchema = z
    .object({
        level: LogLevelSchema.default('error'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1)
            .default([{ type: 'console', colorize: true, stream: 'auto' }]),
    })
    .strict();

export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;
