/**
 * MacroLens API Client
 *
 * API client bound to the app configuration, addressed through the
 * endpoint registry instead of raw paths.
 *
 * @module macrolens/client
 */

import {
    createApiClient,
    createConsoleLogger,
    type ApiClientConfig,
    type Logger,
    type RequestSpec,
    type Result,
    type SendOptions,
    type WireSchema,
} from '../api-client';
import type { AppConfig } from './config';
import { requestFor, type Endpoint } from './endpoints';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface MacroLensClientOptions {
    config: AppConfig;

    /** Returns the current access token, or null when signed out */
    getAuthToken?: () => Promise<string | null>;

    /** Default: console logger following config.logging */
    logger?: Logger;

    /** Called after the client has logged a failed attempt */
    onError?: ApiClientConfig['onError'];

    /** Retry failed decodes with ISO-8601 timestamps. Default: false */
    recoverDates?: boolean;

    /** Transport override, mainly for tests */
    fetch?: typeof fetch;
}

/** Builder options plus transport options for one endpoint call. */
export type EndpointCallOptions = Omit<RequestSpec, 'path' | 'method'> & SendOptions;

function splitOptions(options: EndpointCallOptions): [Omit<RequestSpec, 'path' | 'method'>, SendOptions] {
    const { retries, retryDelay, exponentialBackoff, signal, ...spec } = options;
    return [spec, { retries, retryDelay, exponentialBackoff, signal }];
}

// =============================================================================
// CLIENT FACTORY
// =============================================================================

/**
 * @example
 * const client = createMacroLensClient({
 *   config: loadAppConfig(),
 *   getAuthToken: async () => session.accessToken,
 * });
 *
 * const result = await client.sendWrapped(
 *   { family: 'foodLogs', operation: 'details', params: { id: '42' } },
 *   foodLogSchema
 * );
 */
export function createMacroLensClient(options: MacroLensClientOptions) {
    const { config } = options;

    const logger = options.logger ?? createConsoleLogger({
        prefix: '[MacroLens API]',
        level: config.logging.level,
        enabled: config.logging.enabled,
    });

    const api = createApiClient({
        baseUrl: config.baseUrl,
        appInfo: config.appInfo,
        defaultTimeout: config.requestTimeoutMs,
        getAuthToken: options.getAuthToken,
        recoverDates: options.recoverDates,
        fetch: options.fetch,
        logger,
        onError: (error, context) => {
            logger.error(`${context.method} ${context.url}`, {
                code: error.code,
                statusCode: error.statusCode,
                attempt: context.attempt,
            });
            options.onError?.(error, context);
        },
    });

    return {
        config,

        /** Raw-path access for routes not yet in the registry */
        api,

        /**
         * Calls an endpoint whose body is the payload itself.
         */
        send: <T>(endpoint: Endpoint, schema: WireSchema<T>, callOptions: EndpointCallOptions = {}): Promise<Result<T>> => {
            const [spec, sendOptions] = splitOptions(callOptions);
            return api.request(requestFor(endpoint, spec), schema, sendOptions);
        },

        /**
         * Calls an endpoint whose body is an ApiEnvelope.
         */
        sendWrapped: <T>(endpoint: Endpoint, schema: WireSchema<T>, callOptions: EndpointCallOptions = {}): Promise<Result<T>> => {
            const [spec, sendOptions] = splitOptions(callOptions);
            return api.requestWrapped(requestFor(endpoint, spec), schema, sendOptions);
        },
    };
}

export type MacroLensClient = ReturnType<typeof createMacroLensClient>;
