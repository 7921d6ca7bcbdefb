/**
 * API Client - fetch transport around the request pipeline
 *
 * Features:
 * - Result<T> return type for type-safe error handling
 * - Requests built by the request builder, responses classified by the response handler
 * - Request timeout via AbortController
 * - Optional retries with exponential backoff for retriable errors
 * - Bearer token read per call, only when the request requires auth
 *
 * @module api-client/client
 */

import { buildRequest } from './requestBuilder';
import { createResponseHandler } from './responseHandler';
import { silentLogger, type Logger } from './logger';
import type {
    ApiError,
    AppInfo,
    ErrorContext,
    HttpMethod,
    OutboundRequest,
    RequestSpec,
    ResponseInput,
    Result,
    SendOptions,
} from './types';
import type { DateStrategy, WireSchema } from './wire';

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Configuration for creating an API client instance.
 */
export interface ApiClientConfig {
    /** Base URL including the API prefix (e.g., "http://localhost:8000/api/v1") */
    baseUrl: string;

    /** Sent as X-App-Version, X-Build-Number, X-Platform and X-OS-Version */
    appInfo: AppInfo;

    /** Returns the current bearer token, or null when signed out */
    getAuthToken?: () => Promise<string | null>;

    /** Default timeout for all requests in milliseconds. Default: 30000 */
    defaultTimeout?: number;

    /** Default retry count for retriable errors. Default: 0 */
    defaultRetries?: number;

    /** Default retry delay in milliseconds. Default: 1000 */
    defaultRetryDelay?: number;

    /** Timestamp format expected in response bodies. Default: 'fixed' */
    dateStrategy?: DateStrategy;

    /** Retry failed decodes with ISO-8601 timestamps. Default: false */
    recoverDates?: boolean;

    /** Default: silent */
    logger?: Logger;

    /** Called on every failed attempt (logging, analytics, auth refresh, etc.) */
    onError?: (error: ApiError, context: ErrorContext) => void;

    /** Transport override, mainly for tests. Default: global fetch */
    fetch?: typeof fetch;
}

/** Options for the verb helpers: a RequestSpec minus path and method. */
export type VerbOptions = Omit<RequestSpec, 'path' | 'method'> & SendOptions;

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Resolves after `ms`, or as soon as the signal aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }

        const wake = () => {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', wake);
            resolve();
        };
        const timeoutId = setTimeout(wake, ms);
        signal?.addEventListener('abort', wake);
    });
}

class RequestTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`);
        this.name = 'RequestTimeoutError';
    }
}

// =============================================================================
// API CLIENT FACTORY
// =============================================================================

/**
 * Creates a configured API client instance.
 *
 * @example
 * const api = createApiClient({
 *   baseUrl: 'http://localhost:8000/api/v1',
 *   appInfo: { version: '1.0.0', build: '1', platform: 'iOS', osVersion: '17.4' },
 *   getAuthToken: async () => tokenStore.accessToken,
 * });
 *
 * const result = await api.get('/food/popular', foodListSchema, { requiresAuth: false });
 * if (result.ok) {
 *   console.log(result.data);
 * }
 */
export function createApiClient(config: ApiClientConfig) {
    const {
        baseUrl,
        appInfo,
        getAuthToken,
        defaultTimeout = 30000,
        defaultRetries = 0,
        defaultRetryDelay = 1000,
        dateStrategy,
        recoverDates,
        logger = silentLogger,
        onError,
    } = config;

    // Clean baseUrl - remove trailing slash
    const cleanBaseUrl = baseUrl.replace(/\/$/, '');
    const fetchFn = config.fetch ?? globalThis.fetch;
    const handler = createResponseHandler({ logger, dateStrategy, recoverDates });

    async function readToken(spec: RequestSpec): Promise<string | null> {
        if (!(spec.requiresAuth ?? true) || !getAuthToken) return null;

        try {
            return await getAuthToken();
        } catch (err) {
            // Sent without a token; the server answers 401 if it needs one
            logger.warn('Failed to get auth token', { error: String(err) });
            return null;
        }
    }

    /**
     * Executes one attempt and reports the raw outcome.
     */
    async function execute(request: OutboundRequest, signal?: AbortSignal): Promise<ResponseInput> {
        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, request.timeoutMs);

        const abortFromCaller = () => controller.abort();
        if (signal?.aborted) controller.abort();
        signal?.addEventListener('abort', abortFromCaller);

        try {
            const response = await fetchFn(request.url, {
                method: request.method,
                headers: request.headers,
                body: request.body,
                signal: controller.signal,
            });
            const body = await response.text();

            return {
                body,
                response: { status: response.status, url: request.url, method: request.method },
            };
        } catch (err) {
            return { error: timedOut ? new RequestTimeoutError(request.timeoutMs) : err };
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', abortFromCaller);
        }
    }

    /**
     * Core request function with retry logic.
     */
    async function send<T>(
        spec: RequestSpec,
        schema: WireSchema<T>,
        wrapped: boolean,
        options: SendOptions = {}
    ): Promise<Result<T>> {
        const maxRetries = options.retries ?? defaultRetries;
        const retryDelay = options.retryDelay ?? defaultRetryDelay;
        const useExponentialBackoff = options.exponentialBackoff ?? true;
        const method = spec.method ?? 'GET';

        const built = buildRequest(spec, {
            baseUrl: cleanBaseUrl,
            appInfo,
            defaultTimeoutMs: defaultTimeout,
            accessToken: await readToken(spec),
            logger,
        });

        if (!built.ok) {
            onError?.(built.error, { method, url: spec.path, attempt: 1 });
            return built;
        }

        const request = built.data;

        for (let attempt = 1; ; attempt++) {
            const input = await execute(request, options.signal);
            const result = wrapped
                ? handler.handleWrapped(input, schema)
                : handler.handle(input, schema);

            if (result.ok) {
                return result;
            }

            onError?.(result.error, { method, url: request.url, attempt });

            if (!result.error.retriable || attempt > maxRetries || options.signal?.aborted) {
                return result;
            }

            const delay = useExponentialBackoff
                ? retryDelay * Math.pow(2, attempt - 1)
                : retryDelay;
            logger.warn(`Request failed, retrying in ${delay}ms (attempt ${attempt}/${maxRetries + 1})`, {
                code: result.error.code,
            });
            await sleep(delay, options.signal);

            if (options.signal?.aborted) {
                logger.warn('Request aborted during retry delay');
                return result;
            }
        }
    }

    function verb(method: HttpMethod) {
        return <T>(path: string, schema: WireSchema<T>, options: VerbOptions = {}): Promise<Result<T>> => {
            const { retries, retryDelay, exponentialBackoff, signal, ...rest } = options;
            return send<T>({ ...rest, path, method }, schema, false, {
                retries,
                retryDelay,
                exponentialBackoff,
                signal,
            });
        };
    }

    // =============================================================================
    // PUBLIC API
    // =============================================================================

    return {
        /**
         * Sends a request and decodes the body directly into T.
         */
        request: <T>(spec: RequestSpec, schema: WireSchema<T>, options?: SendOptions): Promise<Result<T>> =>
            send(spec, schema, false, options),

        /**
         * Sends a request whose body is an ApiEnvelope<T> and returns its data.
         */
        requestWrapped: <T>(spec: RequestSpec, schema: WireSchema<T>, options?: SendOptions): Promise<Result<T>> =>
            send(spec, schema, true, options),

        /** @example api.get('/food/search', foodListSchema, { query: { query: 'oats' } }) */
        get: verb('GET'),

        /** @example api.post('/food/custom', foodSchema, { body: customFood }) */
        post: verb('POST'),

        put: verb('PUT'),

        patch: verb('PATCH'),

        delete: verb('DELETE'),
    };
}

// =============================================================================
// TYPE EXPORT FOR CLIENT INSTANCE
// =============================================================================

export type ApiClient = ReturnType<typeof createApiClient>;
