/**
 * Narrow an unknown thrown value to a Node.js system error carrying `code`
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
    return isNodeError(error) && error.code !== undefined && codes.includes(error.code);
}
