import dotenv from 'dotenv';
import { ConfigurationError, MissingCredentialError } from '../domain/errors/TranslationErrors';

// Load environment variables
dotenv.config();

/**
 * Process-wide settings. Credentials are not part of it; resolveCredential
 * reads them from the environment when a translator is constructed.
 */
export interface Config {
    /** Per-request timeout for vendor HTTP calls; overridable with timeoutMs. */
    requestTimeoutMs: number;
}

/**
 * Names of the environment variables consulted for credentials.
 */
export const ENV_VARS = {
    OPENAI_API_KEY: 'OPENAI_API_KEY',
    OPENAI_MODEL: 'OPENAI_MODEL',
    OPENAI_API_BASE: 'OPENAI_API_BASE',
    DEEPL_API_KEY: 'DEEPL_API_KEY',
    MICROSOFT_API_KEY: 'MICROSOFT_API_KEY',
    YANDEX_API_KEY: 'YANDEX_API_KEY',
    PAPAGO_CLIENT_ID: 'PAPAGO_CLIENT_ID',
    PAPAGO_SECRET_KEY: 'PAPAGO_SECRET_KEY',
    QCRI_API_KEY: 'QCRI_API_KEY',
    LIBRE_API_KEY: 'LIBRE_API_KEY',
    BAIDU_APPID: 'BAIDU_APPID',
    BAIDU_APPKEY: 'BAIDU_APPKEY',
    TENCENT_SECRET_ID: 'TENCENT_SECRET_ID',
    TENCENT_SECRET_KEY: 'TENCENT_SECRET_KEY',
    DETECT_LANGUAGE_API_KEY: 'DETECT_LANGUAGE_API_KEY',
    MYMEMORY_EMAIL: 'MYMEMORY_EMAIL',
    TRANSLATOR_TIMEOUT_MS: 'TRANSLATOR_TIMEOUT_MS',
} as const;

export type EnvVarName = typeof ENV_VARS[keyof typeof ENV_VARS];

/**
 * Reads an environment variable, trimming whitespace and wrapping quotes.
 * Empty values count as unset.
 */
export function readEnvVar(key: string): string | undefined {
    let value = process.env[key];
    if (value === undefined) {
        return undefined;
    }

    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value.length > 0 ? value : undefined;
}

function getEnvVarNumber(key: string, defaultValue: number): number {
    const value = readEnvVar(key);
    if (value === undefined) {
        return defaultValue;
    }
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new ConfigurationError(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        requestTimeoutMs: getEnvVarNumber(ENV_VARS.TRANSLATOR_TIMEOUT_MS, 30000),
    };
}

/**
 * Credential resolution order: explicit argument, then the named
 * environment variable, otherwise a MissingCredentialError.
 */
export function resolveCredential(explicit: string | undefined, envVar: EnvVarName, credential: string): string {
    if (explicit !== undefined && explicit.trim().length > 0) {
        return explicit;
    }
    const fromEnv = readEnvVar(envVar);
    if (fromEnv !== undefined) {
        return fromEnv;
    }
    throw new MissingCredentialError(credential, envVar);
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
