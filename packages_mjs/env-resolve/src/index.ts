/**
 * Layered configuration value resolution.
 *
 * Precedence: direct argument > environment > config dict > default.
 * Empty strings count as unset at every layer.
 */

export type EnvSource = Readonly<Record<string, string | undefined>>;

export type EnvKeys = string[] | string | undefined | null;

export type ConfigDict = Readonly<Record<string, unknown>>;

function isSet(value: unknown): value is string {
    return typeof value === 'string' && value !== '';
}

function normalizeKeys(envKeys: EnvKeys): string[] {
    if (!envKeys) return [];
    return Array.isArray(envKeys) ? envKeys : [envKeys];
}

/**
 * Return the first non-empty value among the given environment keys.
 */
export function fromEnv(envKeys: EnvKeys, env: EnvSource = process.env): string | undefined {
    for (const key of normalizeKeys(envKeys)) {
        const value = env[key];
        if (isSet(value)) {
            return value;
        }
    }
    return undefined;
}

/**
 * Resolve configuration value from multiple sources.
 * @param arg - Direct argument value (highest priority)
 * @param envKeys - Environment variable names to check, first match wins
 * @param config - Configuration object (optional)
 * @param configKey - Key to check in config object
 * @param defaultValue - Fallback value
 * @param env - Environment source, `process.env` unless given
 */
export function resolve(
    arg: string | null | undefined,
    envKeys: EnvKeys,
    config: ConfigDict | null | undefined,
    configKey: string | null | undefined,
    defaultValue: string,
    env: EnvSource = process.env
): string {
    if (isSet(arg)) {
        return arg;
    }

    const envValue = fromEnv(envKeys, env);
    if (envValue !== undefined) {
        return envValue;
    }

    if (config && configKey) {
        const configValue = config[configKey];
        if (isSet(configValue)) {
            return configValue;
        }
    }

    return defaultValue;
}
