/**
 * MacroLens app configuration
 *
 * Picks one of three API origins by environment and collects the app
 * information sent in request headers. Values come from environment
 * variables and are validated with zod.
 *
 * @module macrolens/config
 */

import { z } from 'zod';
import type { AppInfo, LogLevel } from '../api-client';

// =============================================================================
// CONSTANTS
// =============================================================================

export const APP_ENVIRONMENTS = ['development', 'staging', 'production'] as const;

export type AppEnvironment = (typeof APP_ENVIRONMENTS)[number];

export const API_ORIGINS: Record<AppEnvironment, string> = {
    development: 'http://localhost:8000',
    staging: 'https://macrolens-api-staging.up.railway.app',
    production: 'https://macrolens-api.up.railway.app',
};

export const API_VERSION = 'v1';

/** Request timeout in milliseconds */
export const REQUEST_TIMEOUT_MS = 30_000;

export const PLATFORM = 'iOS';

// =============================================================================
// CONFIG SHAPE
// =============================================================================

export interface AppConfig {
    environment: AppEnvironment;

    /** Origin + "/api/" + version */
    baseUrl: string;

    appInfo: AppInfo;

    requestTimeoutMs: number;

    logging: {
        enabled: boolean;
        level: LogLevel;
    };
}

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid MacroLens configuration: ${issues.join(', ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

const envSchema = z.object({
    MACROLENS_ENV: z.enum(APP_ENVIRONMENTS).default('development'),
    MACROLENS_APP_VERSION: z.string().min(1).default('1.0.0'),
    MACROLENS_BUILD_NUMBER: z.string().min(1).default('1'),
    MACROLENS_OS_VERSION: z.string().min(1).default('unknown'),
    MACROLENS_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('debug'),
    MACROLENS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(REQUEST_TIMEOUT_MS),
});

// =============================================================================
// LOADERS
// =============================================================================

export function apiBaseUrl(environment: AppEnvironment): string {
    return `${API_ORIGINS[environment]}/api/${API_VERSION}`;
}

/**
 * Reads and validates configuration from environment variables.
 * Empty strings count as unset.
 *
 * @example
 * const config = loadAppConfig({ MACROLENS_ENV: 'staging' });
 * config.baseUrl; // 'https://macrolens-api-staging.up.railway.app/api/v1'
 */
export function loadAppConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );

    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const vars = parsed.data;

    return {
        environment: vars.MACROLENS_ENV,
        baseUrl: apiBaseUrl(vars.MACROLENS_ENV),
        appInfo: {
            version: vars.MACROLENS_APP_VERSION,
            build: vars.MACROLENS_BUILD_NUMBER,
            platform: PLATFORM,
            osVersion: vars.MACROLENS_OS_VERSION,
        },
        requestTimeoutMs: vars.MACROLENS_REQUEST_TIMEOUT_MS,
        logging: {
            // Request logs stay out of staging and production builds
            enabled: vars.MACROLENS_ENV === 'development',
            level: vars.MACROLENS_LOG_LEVEL,
        },
    };
}
