import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config';
import { ConfigError } from '../utils/errors';

const base = { API_ID: '123456', API_HASH: 'test-api-hash' };

describe('loadConfig', () => {
    it('applies defaults for optional settings', () => {
        expect(loadConfig(base)).toEqual({
            API_ID: 123456,
            API_HASH: 'test-api-hash',
            SESSION_NAME: 'default_session',
            BATCH_SIZE: 5,
            DOWNLOAD_DIR: 'downloads',
            MESSAGE_LIMIT: 2000,
            DOWNLOAD_MODE: 'wave',
            LOG_LEVEL: 'info',
        });
    });

    it('reads every setting from the environment', () => {
        const config = loadConfig({
            ...base,
            SESSION_NAME: 'work',
            BATCH_SIZE: '8',
            DOWNLOAD_DIR: '/tmp/media',
            MESSAGE_LIMIT: '500',
            DOWNLOAD_MODE: 'rolling',
            LOG_LEVEL: 'debug',
        });
        expect(config.SESSION_NAME).toBe('work');
        expect(config.BATCH_SIZE).toBe(8);
        expect(config.DOWNLOAD_DIR).toBe('/tmp/media');
        expect(config.MESSAGE_LIMIT).toBe(500);
        expect(config.DOWNLOAD_MODE).toBe('rolling');
        expect(config.LOG_LEVEL).toBe('debug');
    });

    it('requires API credentials', () => {
        expect(() => loadConfig({ API_HASH: 'test-api-hash' })).toThrow(ConfigError);
        expect(() => loadConfig({ API_ID: '1' })).toThrow('Environment variable API_HASH is not set.');
    });

    it('rejects non-numeric and non-positive batch sizes', () => {
        expect(() => loadConfig({ ...base, BATCH_SIZE: 'five' })).toThrow('Environment variable BATCH_SIZE is not a valid integer: "five".');
        expect(() => loadConfig({ ...base, BATCH_SIZE: '0' })).toThrow('Environment variable BATCH_SIZE must be a positive integer, got 0.');
    });

    it('rejects unknown download modes', () => {
        expect(() => loadConfig({ ...base, DOWNLOAD_MODE: 'parallel' })).toThrow(ConfigError);
    });
});
