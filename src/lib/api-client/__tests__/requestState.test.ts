import { describe, it, expect } from 'vitest';
import { apiErrors } from '../errors';
import {
    combineRequestStates,
    emptyState,
    idleState,
    loadingState,
    mapRequestState,
    renderRequestState,
    toRequestState,
    type RequestState,
} from '../requestState';
import type { Result } from '../types';

function success<T>(data: T): RequestState<T> {
    return { status: 'success', data };
}

describe('toRequestState', () => {
    it('maps a successful result to success', () => {
        const result: Result<string[]> = { ok: true, data: ['oats'] };

        expect(toRequestState(result)).toEqual({ status: 'success', data: ['oats'] });
    });

    it('maps empty data to empty when a check is given', () => {
        const result: Result<string[]> = { ok: true, data: [] };

        expect(toRequestState(result, items => items.length === 0)).toBe(emptyState);
        expect(toRequestState(result)).toEqual({ status: 'success', data: [] });
    });

    it('maps a failed result to error', () => {
        const error = apiErrors.notFound();
        const result: Result<string[]> = { ok: false, error };

        expect(toRequestState(result, () => true)).toEqual({ status: 'error', error });
    });
});

describe('mapRequestState', () => {
    it('transforms success data', () => {
        expect(mapRequestState(success(3), count => `${count} meals`)).toEqual(success('3 meals'));
    });

    it('passes other states through unchanged', () => {
        const failed: RequestState<number> = { status: 'error', error: apiErrors.unknown() };

        expect(mapRequestState(failed, String)).toBe(failed);
        expect(mapRequestState(loadingState, String)).toBe(loadingState);
    });
});

describe('renderRequestState', () => {
    const handlers = {
        pending: () => 'pending',
        success: (count: number) => `count ${count}`,
        error: () => 'error',
    };

    it('picks the handler for the state', () => {
        expect(renderRequestState(success(2), handlers)).toBe('count 2');
        expect(renderRequestState({ status: 'error', error: apiErrors.unknown() }, handlers)).toBe('error');
    });

    it('renders idle, loading and unhandled empty states as pending', () => {
        expect(renderRequestState(idleState, handlers)).toBe('pending');
        expect(renderRequestState(loadingState, handlers)).toBe('pending');
        expect(renderRequestState(emptyState, handlers)).toBe('pending');
        expect(renderRequestState(emptyState, { ...handlers, empty: () => 'none' })).toBe('none');
    });
});

describe('combineRequestStates', () => {
    it('is loading while either is loading', () => {
        expect(combineRequestStates(loadingState, success(1)).status).toBe('loading');
    });

    it('takes the first error', () => {
        const first = apiErrors.unauthorized();
        const second = apiErrors.serverError(500);

        expect(combineRequestStates({ status: 'error', error: first }, { status: 'error', error: second }))
            .toEqual({ status: 'error', error: first });
        expect(combineRequestStates(success(1), { status: 'error', error: second }))
            .toEqual({ status: 'error', error: second });
    });

    it('pairs the data when both succeed', () => {
        expect(combineRequestStates(success('goals'), success(2)))
            .toEqual({ status: 'success', data: ['goals', 2] });
    });

    it('is idle only when both are idle', () => {
        expect(combineRequestStates(idleState, idleState).status).toBe('idle');
        expect(combineRequestStates(idleState, emptyState).status).toBe('empty');
        expect(combineRequestStates(idleState, success(1)).status).toBe('loading');
    });
});
