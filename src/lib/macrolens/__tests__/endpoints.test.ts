import { describe, it, expect, expectTypeOf } from 'vitest';
import { buildRequest } from '../../api-client';
import {
    fullUrl,
    getResourceFamilies,
    interpolatePath,
    listEndpoints,
    requestFor,
    resolveEndpoint,
    type Endpoint,
    type PathParamNames,
} from '../endpoints';

describe('resolveEndpoint', () => {
    it('fills path params into the template', () => {
        expect(resolveEndpoint({ family: 'foodLogs', operation: 'details', params: { id: '42' } }))
            .toEqual({ path: '/food/logs/42', method: 'GET' });
        expect(resolveEndpoint({ family: 'foodLogs', operation: 'byDate', params: { date: '2024-03-05' } }))
            .toEqual({ path: '/food/logs/date/2024-03-05', method: 'GET' });
        expect(resolveEndpoint({ family: 'recipes', operation: 'toggleFavorite', params: { id: 'r1' } }))
            .toEqual({ path: '/recipes/r1/favorite', method: 'POST' });
    });

    it('keeps the verb of each operation', () => {
        expect(resolveEndpoint({ family: 'foodLogs', operation: 'update', params: { id: '7' } }).method).toBe('PUT');
        expect(resolveEndpoint({ family: 'foodLogs', operation: 'delete', params: { id: '7' } }).method).toBe('DELETE');
        expect(resolveEndpoint({ family: 'users', operation: 'deleteAccount' }))
            .toEqual({ path: '/users/account', method: 'DELETE' });
    });

    it('inserts values verbatim', () => {
        expect(interpolatePath('/food/logs/{id}', { id: 'a b/c' })).toBe('/food/logs/a b/c');
    });

    it('requires params exactly where the path has placeholders', () => {
        expectTypeOf<PathParamNames<'/recipes/{id}/favorite'>>().toEqualTypeOf<'id'>();
        expectTypeOf<PathParamNames<'/food/popular'>>().toEqualTypeOf<never>();
        expectTypeOf<Extract<Endpoint, { family: 'foodLogs'; operation: 'byDate' }>['params']>()
            .toEqualTypeOf<Record<'date', string>>();
    });
});

describe('requestFor', () => {
    it('merges builder options with the resolved route', () => {
        expect(requestFor({ family: 'food', operation: 'popular' }, { requiresAuth: false }))
            .toEqual({ requiresAuth: false, path: '/food/popular', method: 'GET' });
    });

    it('builds a GET for /food/logs/{id} with id 42', () => {
        const built = buildRequest(requestFor({ family: 'foodLogs', operation: 'details', params: { id: '42' } }), {
            baseUrl: 'http://localhost:8000/api/v1',
            appInfo: { version: '1.0.0', build: '1', platform: 'iOS', osVersion: '17.4' },
            defaultTimeoutMs: 30000,
        });

        expect(built.ok).toBe(true);
        if (built.ok) {
            expect(new URL(built.data.url).pathname).toBe('/api/v1/food/logs/42');
            expect(built.data.method).toBe('GET');
        }
    });

    it('refuses to build a delete whose id would climb out of /food/logs', () => {
        const endpoint: Endpoint = { family: 'foodLogs', operation: 'delete', params: { id: '../../users/account' } };

        const built = buildRequest(requestFor(endpoint), {
            baseUrl: 'http://localhost:8000/api/v1',
            appInfo: { version: '1.0.0', build: '1', platform: 'iOS', osVersion: '17.4' },
            defaultTimeoutMs: 30000,
        });

        expect(!built.ok && built.error.code).toBe('INVALID_ENDPOINT');
    });
});

describe('fullUrl', () => {
    it('joins the base URL and path without a double slash', () => {
        expect(fullUrl({ family: 'progress', operation: 'stats' }, 'http://localhost:8000/api/v1/'))
            .toBe('http://localhost:8000/api/v1/progress/stats');
    });
});

describe('registry helpers', () => {
    it('lists families in order', () => {
        expect(getResourceFamilies()).toEqual([
            'auth',
            'users',
            'food',
            'foodLogs',
            'nutrition',
            'recipes',
            'mealPlans',
            'progress',
            'health',
        ]);
    });

    it('lists the endpoints of one family', () => {
        expect(listEndpoints('health')).toEqual([
            { family: 'health', operation: 'sync', method: 'POST', path: '/health/sync', description: 'Upload health-app samples' },
            { family: 'health', operation: 'data', method: 'GET', path: '/health/data', description: 'Synced health data' },
        ]);
    });

    it('gives every route an absolute path', () => {
        const all = listEndpoints();

        expect(all).toHaveLength(49);
        expect(all.every(endpoint => endpoint.path.startsWith('/'))).toBe(true);
    });
});
