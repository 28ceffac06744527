import type { ZodError, ZodIssue } from 'zod';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue, Severity } from '../errors/types.js';

/**
 * Result of a validation flow: data plus any warnings, or the issues that stopped it.
 * Runtime failures are thrown as CorralRuntimeError instead.
 */
export type Result<T, C = unknown> =
    | { ok: true; data: T; issues: Issue<C>[] }
    | { ok: false; issues: Issue<C>[] };

export function ok<T, C = unknown>(data: T, issues: Issue<C>[] = []): Result<T, C> {
    return { ok: true, data, issues };
}

export function fail<T, C = unknown>(issues: Issue<C>[]): Result<T, C> {
    return { ok: false, issues };
}

export function hasErrors<C>(issues: Issue<C>[]): boolean {
    return issues.some((i) => i.severity === 'error');
}

export function splitIssues<C>(issues: Issue<C>[]): { errors: Issue<C>[]; warnings: Issue<C>[] } {
    return {
        errors: issues.filter((i) => i.severity === 'error'),
        warnings: issues.filter((i) => i.severity === 'warning'),
    };
}

/**
 * Convert a ZodError into issues. Union failures are flattened so the
 * caller sees the messages from every branch, not only the first.
 */
export function zodToIssues<C = unknown>(
    error: ZodError,
    severity: Severity = 'error',
    scope: ErrorScope | string = ErrorScope.CONFIG
): Issue<C>[] {
    const issues: Issue<C>[] = [];

    const visit = (issue: ZodIssue): void => {
        if (issue.code === 'invalid_union' && issue.unionErrors.length > 0) {
            for (const unionError of issue.unionErrors) {
                unionError.issues.forEach(visit);
            }
            return;
        }
        issues.push({
            code: 'schema_validation',
            message: issue.message,
            scope,
            type: ErrorType.USER,
            severity,
            path: issue.path,
        });
    };

    error.issues.forEach(visit);
    return issues;
}
