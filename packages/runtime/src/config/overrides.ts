/**
 * Override layers applied on top of the configuration file.
 * Precedence: CLI flags, then environment, then file, then schema defaults.
 */

import { isPlainObject } from './loader.js';

/**
 * Fields that can be set from the environment or the command line.
 * Values are unvalidated; the schema checks them after merging.
 */
export interface SandboxConfigOverrides {
    projectRoot?: string | undefined;
    scratchRoot?: string | undefined;
    logLevel?: string | undefined;
}

export const ENV_PROJECT_ROOT = 'CORRAL_PROJECT_ROOT';
export const ENV_SCRATCH_ROOT = 'CORRAL_SCRATCH_ROOT';
export const ENV_LOG_LEVEL = 'CORRAL_LOG_LEVEL';

function nonEmpty(value: string | undefined): string | undefined {
    return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): SandboxConfigOverrides {
    return {
        projectRoot: nonEmpty(env[ENV_PROJECT_ROOT]),
        scratchRoot: nonEmpty(env[ENV_SCRATCH_ROOT]),
        logLevel: nonEmpty(env[ENV_LOG_LEVEL]),
    };
}

/**
 * Merge override layers into a raw config object, lowest precedence first.
 * Returns a new object; the input is not modified.
 */
export function applyOverrides(
    base: Record<string, unknown>,
    ...layers: SandboxConfigOverrides[]
): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...base };

    for (const layer of layers) {
        if (layer.projectRoot !== undefined) {
            merged.projectRoot = layer.projectRoot;
        }
        if (layer.scratchRoot !== undefined) {
            merged.scratchRoot = layer.scratchRoot;
        }
        if (layer.logLevel !== undefined) {
            const logger = isPlainObject(merged.logger) ? merged.logger : {};
            merged.logger = { ...logger, level: layer.logLevel };
        }
    }

    return merged;
}
