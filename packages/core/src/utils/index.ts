export { ok, fail, hasErrors, splitIssues, zodToIssues } from './result.js';
export type { Result } from './result.js';
export { isNodeError, hasErrorCode } from './node-errors.js';
