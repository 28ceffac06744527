import { ensureOk } from '@corral/core';
import type { Logger } from '@corral/core';
import { loadConfigFile } from './loader.js';
import { applyOverrides, readEnvOverrides, type SandboxConfigOverrides } from './overrides.js';
import { validateSandboxConfig, type SandboxConfig } from './schemas.js';

export interface ResolveConfigOptions {
    /** YAML file to start from; omitted means schema defaults only */
    configPath?: string | undefined;
    env?: NodeJS.ProcessEnv;
    /** Command-line values, highest precedence */
    overrides?: SandboxConfigOverrides;
    logger?: Logger;
}

/**
 * Build the validated sandbox configuration from file, environment and flags.
 *
 * @throws {CorralRuntimeError} from loadConfigFile when the file cannot be used
 * @throws {CorralValidationError} when the merged config fails the schema
 */
export async function resolveSandboxConfig(options: ResolveConfigOptions = {}): Promise<SandboxConfig> {
    const fromFile =
        options.configPath !== undefined ? await loadConfigFile(options.configPath, options.logger) : {};

    const merged = applyOverrides(
        fromFile,
        readEnvOverrides(options.env),
        options.overrides ?? {}
    );

    return ensureOk(validateSandboxConfig(merged), options.logger);
}
