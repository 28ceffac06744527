import type { SandboxResponse, SandboxRuntime } from '@corral/runtime';
import { SandboxError } from '@corral/runtime';

/**
 * Run a single operation. `json` is the operation's input object; omitted means `{}`.
 */
export async function callOperation(
    runtime: SandboxRuntime,
    operation: string,
    json: string | undefined
): Promise<SandboxResponse> {
    let input: unknown = {};
    if (json !== undefined) {
        try {
            input = JSON.parse(json);
        } catch (error) {
            const cause = error instanceof Error ? error.message : String(error);
            return { operation, ok: false, error: SandboxError.malformedJson(cause).toJSON() };
        }
    }
    return runtime.dispatch({ operation, input });
}
