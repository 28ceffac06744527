import type { Issue } from './types.js';

/**
 * Validation error carrying every issue found, thrown by `ensureOk`
 */
export class CorralValidationError extends Error {
    constructor(public readonly issues: Issue[]) {
        super(CorralValidationError.summarize(issues));
        this.name = 'CorralValidationError';
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }

    toJSON() {
        return {
            name: this.name,
            message: this.message,
            issues: this.issues,
        };
    }

    private static summarize(issues: Issue[]): string {
        const errors = issues.filter((i) => i.severity === 'error');
        if (errors.length === 0) {
            return 'Validation failed';
        }
        const lines = errors.map((i) =>
            i.path && i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message
        );
        return `Validation failed: ${lines.join('; ')}`;
    }
}
