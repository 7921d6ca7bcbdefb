/**
 * Shared fixtures for the api-client tests.
 */

import { vi } from 'vitest';
import type { Logger } from '../logger';
import type { AppInfo } from '../types';

export const TEST_BASE_URL = 'http://localhost:8000/api/v1';

export const TEST_APP_INFO: AppInfo = {
    version: '1.0.0',
    build: '42',
    platform: 'iOS',
    osVersion: '17.4',
};

export function createMockLogger() {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    } satisfies Logger;
}

/**
 * fetch stub answering every call with the given status and JSON body.
 */
export function createMockFetch(status: number, body?: unknown) {
    return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response(body === undefined ? null : JSON.stringify(body), { status })
    );
}
