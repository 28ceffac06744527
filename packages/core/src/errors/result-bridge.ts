import type { Result } from '../utils/result.js';
import { CorralValidationError } from './CorralValidationError.js';
import type { Logger } from '../logger/types.js';

/**
 * Bridge function to convert Result pattern to validation exceptions
 * Used at public API boundaries for validation flows
 *
 * Note: Runtime errors are thrown directly, not through Result pattern
 *
 * @example
 * ```typescript
 * const config = ensureOk(validateSandboxConfig(raw));
 * ```
 */
export function ensureOk<T, C>(result: Result<T, C>, logger?: Logger): T {
    if (result.ok) {
        return result.data;
    }

    logger?.error(`ensureOk: found ${result.issues.length} validation issue(s)`, {
        issues: result.issues.map((i) => i.message),
    });
    throw new CorralValidationError(result.issues);
}
