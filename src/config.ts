import dotenv from 'dotenv';
import { ConfigError } from './utils/errors';

dotenv.config();

export type DownloadMode = 'wave' | 'rolling';

export interface AppConfig {
    API_ID: number;
    API_HASH: string;
    SESSION_NAME: string;
    BATCH_SIZE: number;
    DOWNLOAD_DIR: string;
    MESSAGE_LIMIT: number;
    DOWNLOAD_MODE: DownloadMode;
    LOG_LEVEL: string;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, required: boolean = true): string {
    const value = env[key]?.trim();
    if (required && !value) {
        throw new ConfigError(`Environment variable ${key} is not set.`);
    }
    return value || '';
}

function getEnvVarAsInt(env: Env, key: string, defaultValue?: number): number {
    const value = env[key]?.trim();
    if (!value) {
        if (defaultValue === undefined) {
            throw new ConfigError(`Environment variable ${key} is not set and no default value provided.`);
        }
        return defaultValue;
    }
    if (!/^-?\d+$/.test(value)) {
        throw new ConfigError(`Environment variable ${key} is not a valid integer: "${value}".`);
    }
    return parseInt(value, 10);
}

function getPositiveInt(env: Env, key: string, defaultValue?: number): number {
    const parsed = getEnvVarAsInt(env, key, defaultValue);
    if (parsed < 1) {
        throw new ConfigError(`Environment variable ${key} must be a positive integer, got ${parsed}.`);
    }
    return parsed;
}

function getDownloadMode(env: Env): DownloadMode {
    const value = getEnvVar(env, 'DOWNLOAD_MODE', false) || 'wave';
    if (value !== 'wave' && value !== 'rolling') {
        throw new ConfigError(`Environment variable DOWNLOAD_MODE must be "wave" or "rolling", got "${value}".`);
    }
    return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
    return {
        API_ID: getPositiveInt(env, 'API_ID'),
        API_HASH: getEnvVar(env, 'API_HASH'),
        SESSION_NAME: getEnvVar(env, 'SESSION_NAME', false) || 'default_session',
        BATCH_SIZE: getPositiveInt(env, 'BATCH_SIZE', 5), // Default 5 concurrent downloads
        DOWNLOAD_DIR: getEnvVar(env, 'DOWNLOAD_DIR', false) || 'downloads',
        MESSAGE_LIMIT: getPositiveInt(env, 'MESSAGE_LIMIT', 2000),
        DOWNLOAD_MODE: getDownloadMode(env),
        LOG_LEVEL: getEnvVar(env, 'LOG_LEVEL', false) || 'info',
    };
}
