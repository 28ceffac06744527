import { z } from 'zod';

/**
 * The closed set of operations the sandbox answers. Adding an operation
 * means adding it here and registering a tool with the same id.
 */
export const SANDBOX_OPERATIONS = [
    'run_command',
    'poll_command',
    'collect_command',
    'kill_command',
    'read_file',
    'write_file',
    'edit_file',
    'glob_files',
    'grep_content',
] as const;

export type SandboxOperation = (typeof SANDBOX_OPERATIONS)[number];

const operationSet: ReadonlySet<string> = new Set(SANDBOX_OPERATIONS);

export function isSandboxOperation(value: string): value is SandboxOperation {
    return operationSet.has(value);
}

/**
 * Wire request: `{id?, operation, input}`
 */
export const SandboxRequestSchema = z
    .object({
        id: z.union([z.string(), z.number()]).optional().describe('Echoed back on the response'),
        operation: z.string().min(1).describe('Operation name, e.g. read_file'),
        input: z.unknown().optional().describe('Operation arguments; validated by the tool'),
    })
    .strict();

export type SandboxRequest = z.output<typeof SandboxRequestSchema>;
