/**
 * @corral/runtime
 *
 * Sandbox configuration and the request dispatcher that ties the tool packages together.
 */

export { createSandboxRuntime, SandboxRuntime } from './sandbox-runtime.js';
export type { SandboxResponse, SandboxRuntimeOptions, RequestId } from './sandbox-runtime.js';
export {
    SANDBOX_OPERATIONS,
    SandboxRequestSchema,
    isSandboxOperation,
} from './operations.js';
export type { SandboxOperation, SandboxRequest } from './operations.js';
export { SandboxError } from './errors.js';
export { SandboxErrorCode } from './error-codes.js';

export {
    SandboxConfigSchema,
    DEFAULT_SCRATCH_ROOT,
    validateSandboxConfig,
} from './config/schemas.js';
export type { SandboxConfig, SandboxConfigInput } from './config/schemas.js';
export { loadConfigFile } from './config/loader.js';
export {
    applyOverrides,
    readEnvOverrides,
    ENV_PROJECT_ROOT,
    ENV_SCRATCH_ROOT,
    ENV_LOG_LEVEL,
} from './config/overrides.js';
export type { SandboxConfigOverrides } from './config/overrides.js';
export { resolveSandboxConfig } from './config/resolve.js';
export type { ResolveConfigOptions } from './config/resolve.js';
export { ConfigError } from './config/errors.js';
export { ConfigErrorCode } from './config/error-codes.js';
