import { describe, it, expect } from 'vitest';
import { apiErrors, ApiRequestError, isApiError, unwrap } from '../errors';
import type { Result } from '../types';

describe('apiErrors', () => {
    it('marks only network and server errors as retriable', () => {
        expect(apiErrors.networkFailure(new Error('offline')).retriable).toBe(true);
        expect(apiErrors.serverError(502).retriable).toBe(true);

        expect(apiErrors.unauthorized().retriable).toBe(false);
        expect(apiErrors.validation('bad').retriable).toBe(false);
        expect(apiErrors.decoding(new Error('bad json')).retriable).toBe(false);
        expect(apiErrors.invalidResponse().retriable).toBe(false);
    });

    it('keeps the underlying cause', () => {
        const cause = new SyntaxError('Unexpected end of JSON input');

        expect(apiErrors.decoding(cause)).toEqual({
            code: 'DECODING_ERROR',
            message: 'Failed to parse server response',
            details: 'Unexpected end of JSON input',
            retriable: false,
            cause,
        });
    });

    it('describes non-Error causes as text', () => {
        expect(apiErrors.networkFailure('connection reset').details).toBe('connection reset');
    });
});

describe('isApiError', () => {
    it('accepts values shaped like an ApiError', () => {
        expect(isApiError(apiErrors.notFound())).toBe(true);
        expect(isApiError({ code: 'UNKNOWN', message: 'x', retriable: false })).toBe(true);
    });

    it('rejects unknown codes and other values', () => {
        expect(isApiError({ code: 'TIMEOUT', message: 'x', retriable: true })).toBe(false);
        expect(isApiError(new Error('x'))).toBe(false);
        expect(isApiError(null)).toBe(false);
        expect(isApiError('NOT_FOUND')).toBe(false);
    });
});

describe('unwrap', () => {
    it('returns the data of a successful result', () => {
        const result: Result<number> = { ok: true, data: 3 };

        expect(unwrap(result)).toBe(3);
    });

    it('throws ApiRequestError carrying the ApiError', () => {
        const error = apiErrors.forbidden();
        const result: Result<number> = { ok: false, error };

        let thrown: unknown;
        try {
            unwrap(result);
        } catch (err) {
            thrown = err;
        }

        expect(thrown).toBeInstanceOf(ApiRequestError);
        if (thrown instanceof ApiRequestError) {
            expect(thrown.code).toBe('FORBIDDEN');
            expect(thrown.message).toBe("You don't have permission to access this.");
            expect(thrown.apiError).toBe(error);
        }
    });
});
