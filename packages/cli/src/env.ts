import * as path from 'node:path';
import dotenv from 'dotenv';

/**
 * Variables from `<cwd>/.env` merged under the shell environment.
 * Shell values win; blank shell values do not mask the file.
 */
export function loadEnvironment(
    cwd: string = process.cwd(),
    shellEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = {};

    const result = dotenv.config({ path: path.join(cwd, '.env'), processEnv: {} });
    if (result.parsed) {
        Object.assign(env, result.parsed);
    }

    for (const [key, value] of Object.entries(shellEnv)) {
        if (value !== undefined && value !== '') {
            env[key] = value;
        }
    }

    return env;
}
