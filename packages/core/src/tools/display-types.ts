import { z } from 'zod';

/**
 * Presentation hints a tool may attach to its result under `_display`.
 * Clients that do not render them can ignore the field; `corral call --pretty`
 * renders them.
 */

export const DiffDisplaySchema = z.object({
    type: z.literal('diff'),
    filename: z.string(),
    /** `createPatch` output from the diff package */
    unified: z.string(),
    additions: z.number().int().nonnegative(),
    deletions: z.number().int().nonnegative(),
});

export const ShellDisplaySchema = z.object({
    type: z.literal('shell'),
    command: z.string(),
    /** Absent while the process is still running */
    exitCode: z.number().int().optional(),
    /** Milliseconds */
    duration: z.number().nonnegative(),
    isBackground: z.boolean().optional(),
    stdout: z.string().optional(),
    stderr: z.string().optional(),
});

export const SearchMatchSchema = z.object({
    file: z.string(),
    /** 1-based; 0 for glob results, which have no line */
    line: z.number().int().nonnegative(),
    content: z.string(),
    context: z.array(z.string()).optional(),
});

export const SearchDisplaySchema = z.object({
    type: z.literal('search'),
    pattern: z.string(),
    matches: z.array(SearchMatchSchema),
    /** Can exceed `matches.length` when the result was capped */
    totalMatches: z.number().int().nonnegative(),
    truncated: z.boolean(),
});

export const FileDisplaySchema = z.object({
    type: z.literal('file'),
    path: z.string(),
    operation: z.enum(['read', 'write', 'create']),
    size: z.number().int().nonnegative().optional(),
    lineCount: z.number().int().nonnegative().optional(),
});

export const ToolDisplaySchema = z.discriminatedUnion('type', [
    DiffDisplaySchema,
    ShellDisplaySchema,
    SearchDisplaySchema,
    FileDisplaySchema,
]);

export type DiffDisplayData = z.output<typeof DiffDisplaySchema>;
export type ShellDisplayData = z.output<typeof ShellDisplaySchema>;
export type SearchMatch = z.output<typeof SearchMatchSchema>;
export type SearchDisplayData = z.output<typeof SearchDisplaySchema>;
export type FileDisplayData = z.output<typeof FileDisplaySchema>;
export type ToolDisplayData = z.output<typeof ToolDisplaySchema>;

const CarriesDisplaySchema = z.object({ _display: ToolDisplaySchema });

/**
 * The `_display` payload of a tool result, or undefined when the result has
 * none or it is malformed.
 */
export function extractDisplayData(result: unknown): ToolDisplayData | undefined {
    const parsed = CarriesDisplaySchema.safeParse(result);
    return parsed.success ? parsed.data._display : undefined;
}
