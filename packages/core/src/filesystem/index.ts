export { PathGuard } from './path-guard.js';
export type { PathKind } from './path-guard.js';
export { AllowedRoots, isWithinRoot } from './allowed-roots.js';
export { PathError } from './errors.js';
export { PathErrorCode } from './error-codes.js';
