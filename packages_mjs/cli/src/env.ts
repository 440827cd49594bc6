import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { type EnvSource, resolve } from '@watson/env-resolve';
import { setLogLevel, setLogPrefix, DEFAULT_PREFIX } from './logger.js';

export const ENV_LOG_LEVEL = 'WATSON_LOG_LEVEL';
export const ENV_LOG_PREFIX = 'WATSON_LOG_PREFIX';

/**
 * Build the environment the client resolves against: variables from the
 * dotenv file, overridden by the process environment.
 */
export function loadEnv(envFile: string | undefined, processEnv: EnvSource, cwd: string): EnvSource {
    if (!envFile) {
        return processEnv;
    }

    const location = path.resolve(cwd, envFile);
    if (!fs.existsSync(location)) {
        return processEnv;
    }

    const fileEnv = dotenv.parse(fs.readFileSync(location, 'utf-8'));
    const merged: Record<string, string | undefined> = { ...fileEnv };
    for (const [key, value] of Object.entries(processEnv)) {
        if (value !== undefined) {
            merged[key] = value;
        }
    }
    return merged;
}

export function configureLogging(env: EnvSource): void {
    setLogLevel(resolve(null, ENV_LOG_LEVEL, null, null, 'info', env));
    setLogPrefix(resolve(null, ENV_LOG_PREFIX, null, null, DEFAULT_PREFIX, env));
}
