/**
 * API Errors
 *
 * Factories for every ApiError kind, status-code classification, and a
 * thrown wrapper for callers that prefer exceptions over Result.
 *
 * @module api-client/errors
 */

import type { ApiError, ApiErrorCode, Result } from './types';

// =============================================================================
// USER-FACING MESSAGES
// =============================================================================

export const ERROR_MESSAGES = {
    generic: 'Something went wrong. Please try again.',
    network: 'Unable to connect. Check your internet connection.',
    authentication: 'Authentication failed. Please log in again.',
    forbidden: "You don't have permission to access this.",
    notFound: 'The requested item could not be found.',
    invalidResponse: 'Invalid response from server',
    decoding: 'Failed to parse server response',
} as const;

function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return String(cause);
}

// =============================================================================
// ERROR FACTORIES
// =============================================================================

export const apiErrors = {
    networkFailure: (cause: unknown): ApiError => ({
        code: 'NETWORK_ERROR',
        message: ERROR_MESSAGES.network,
        details: describeCause(cause),
        retriable: true,
        cause,
    }),

    invalidResponse: (details?: string): ApiError => ({
        code: 'INVALID_RESPONSE',
        message: ERROR_MESSAGES.invalidResponse,
        details,
        retriable: false,
    }),

    unauthorized: (): ApiError => ({
        code: 'UNAUTHORIZED',
        message: ERROR_MESSAGES.authentication,
        retriable: false,
        statusCode: 401,
    }),

    forbidden: (): ApiError => ({
        code: 'FORBIDDEN',
        message: ERROR_MESSAGES.forbidden,
        retriable: false,
        statusCode: 403,
    }),

    notFound: (): ApiError => ({
        code: 'NOT_FOUND',
        message: ERROR_MESSAGES.notFound,
        retriable: false,
        statusCode: 404,
    }),

    validation: (message: string, statusCode?: number): ApiError => ({
        code: 'VALIDATION_ERROR',
        message,
        retriable: false,
        statusCode,
    }),

    serverError: (statusCode: number): ApiError => ({
        code: 'SERVER_ERROR',
        message: `Server error (Code: ${statusCode})`,
        retriable: true,
        statusCode,
    }),

    decoding: (cause: unknown): ApiError => ({
        code: 'DECODING_ERROR',
        message: ERROR_MESSAGES.decoding,
        details: describeCause(cause),
        retriable: false,
        cause,
    }),

    unknown: (statusCode?: number): ApiError => ({
        code: 'UNKNOWN',
        message: ERROR_MESSAGES.generic,
        retriable: false,
        statusCode,
    }),

    invalidEndpoint: (path: string, cause?: unknown): ApiError => ({
        code: 'INVALID_ENDPOINT',
        message: `Invalid URL for endpoint: ${path}`,
        retriable: false,
        cause,
    }),

    encodingFailed: (cause: unknown): ApiError => ({
        code: 'ENCODING_FAILED',
        message: `Failed to encode parameters: ${describeCause(cause)}`,
        retriable: false,
        cause,
    }),
};

// =============================================================================
// STATUS CODE CLASSIFICATION
// =============================================================================

/**
 * Classifies an HTTP status code. Returns null for 2xx.
 *
 * @example
 * validateStatusCode(204); // null
 * validateStatusCode(422); // VALIDATION_ERROR "Request failed with status code 422"
 * validateStatusCode(503); // SERVER_ERROR, statusCode 503
 */
export function validateStatusCode(statusCode: number): ApiError | null {
    if (statusCode >= 200 && statusCode <= 299) return null;

    switch (statusCode) {
        case 401:
            return apiErrors.unauthorized();
        case 403:
            return apiErrors.forbidden();
        case 404:
            return apiErrors.notFound();
    }

    if (statusCode >= 400 && statusCode <= 499) {
        return apiErrors.validation(`Request failed with status code ${statusCode}`, statusCode);
    }
    if (statusCode >= 500 && statusCode <= 599) {
        return apiErrors.serverError(statusCode);
    }
    return apiErrors.unknown(statusCode);
}

// =============================================================================
// GUARDS & THROWING HELPERS
// =============================================================================

const ERROR_CODES: ReadonlySet<string> = new Set<ApiErrorCode>([
    'NETWORK_ERROR',
    'INVALID_RESPONSE',
    'UNAUTHORIZED',
    'FORBIDDEN',
    'NOT_FOUND',
    'VALIDATION_ERROR',
    'SERVER_ERROR',
    'DECODING_ERROR',
    'UNKNOWN',
    'INVALID_ENDPOINT',
    'ENCODING_FAILED',
]);

export function isApiError(value: unknown): value is ApiError {
    if (typeof value !== 'object' || value === null) return false;
    if (!('code' in value) || !('message' in value) || !('retriable' in value)) return false;
    return typeof value.code === 'string'
        && ERROR_CODES.has(value.code)
        && typeof value.message === 'string'
        && typeof value.retriable === 'boolean';
}

/**
 * Error thrown by `unwrap` so that failures keep a stack trace.
 */
export class ApiRequestError extends Error {
    readonly apiError: ApiError;

    constructor(apiError: ApiError) {
        super(apiError.message);
        this.name = 'ApiRequestError';
        this.apiError = apiError;
    }

    get code(): ApiErrorCode {
        return this.apiError.code;
    }
}

/**
 * Returns the data of a successful Result or throws ApiRequestError.
 * Prefer checking `result.ok` directly.
 *
 * @example
 * const logs = unwrap(await api.foodLogs.today());
 */
export function unwrap<T>(result: Result<T>): T {
    if (result.ok) {
        return result.data;
    }
    throw new ApiRequestError(result.error);
}
