import { describe, it, expect } from 'vitest';
import { ConfigError, loadAppConfig } from '../config';

describe('loadAppConfig', () => {
    it('falls back to development defaults', () => {
        expect(loadAppConfig({})).toEqual({
            environment: 'development',
            baseUrl: 'http://localhost:8000/api/v1',
            appInfo: { version: '1.0.0', build: '1', platform: 'iOS', osVersion: 'unknown' },
            requestTimeoutMs: 30000,
            logging: { enabled: true, level: 'debug' },
        });
    });

    it('picks the origin for the environment and disables logging outside development', () => {
        const staging = loadAppConfig({ MACROLENS_ENV: 'staging' });
        const production = loadAppConfig({ MACROLENS_ENV: 'production' });

        expect(staging.baseUrl).toBe('https://macrolens-api-staging.up.railway.app/api/v1');
        expect(production.baseUrl).toBe('https://macrolens-api.up.railway.app/api/v1');
        expect(staging.logging.enabled).toBe(false);
        expect(production.logging.enabled).toBe(false);
    });

    it('reads app information and the timeout', () => {
        const config = loadAppConfig({
            MACROLENS_APP_VERSION: '2.3.0',
            MACROLENS_BUILD_NUMBER: '118',
            MACROLENS_OS_VERSION: '17.4',
            MACROLENS_REQUEST_TIMEOUT_MS: '5000',
            MACROLENS_LOG_LEVEL: 'warn',
        });

        expect(config.appInfo).toEqual({ version: '2.3.0', build: '118', platform: 'iOS', osVersion: '17.4' });
        expect(config.requestTimeoutMs).toBe(5000);
        expect(config.logging.level).toBe('warn');
    });

    it('treats empty values as unset and ignores unrelated variables', () => {
        const config = loadAppConfig({ MACROLENS_ENV: '', HOME: '/home/test' });

        expect(config.environment).toBe('development');
    });

    it('throws ConfigError listing every invalid variable', () => {
        let thrown: unknown;
        try {
            loadAppConfig({ MACROLENS_ENV: 'qa', MACROLENS_REQUEST_TIMEOUT_MS: '-1' });
        } catch (err) {
            thrown = err;
        }

        expect(thrown).toBeInstanceOf(ConfigError);
        if (thrown instanceof ConfigError) {
            expect(thrown.issues.map(issue => issue.split(':')[0])).toEqual([
                'MACROLENS_ENV',
                'MACROLENS_REQUEST_TIMEOUT_MS',
            ]);
            expect(thrown.message.startsWith('Invalid MacroLens configuration: MACROLENS_ENV: ')).toBe(true);
        }
    });
});
