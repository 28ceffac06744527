export { ErrorScope, ErrorType } from './types.js';
export type { CorralErrorCode, Issue, Severity } from './types.js';
export { CorralRuntimeError, toRuntimeError } from './CorralRuntimeError.js';
export type { SerializedError } from './CorralRuntimeError.js';
export { CorralValidationError } from './CorralValidationError.js';
export { ensureOk } from './result-bridge.js';
