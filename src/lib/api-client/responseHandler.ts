/**
 * Response Handler
 *
 * Classifies a transport outcome and decodes its body into a typed value.
 * Steps run in order and stop at the first failure:
 *
 * 1. transport error        → NETWORK_ERROR
 * 2. no response metadata   → INVALID_RESPONSE
 * 3. non-2xx status         → status-specific error (body is not decoded)
 * 4. absent or empty body   → INVALID_RESPONSE
 * 5. invalid UTF-8 bytes    → DECODING_ERROR
 * 6. body fails the schema  → DECODING_ERROR (optionally retried with ISO-8601 timestamps)
 *
 * `handleWrapped` additionally unwraps the `{ success, data, message, error }`
 * envelope.
 *
 * @module api-client/responseHandler
 */

import { z } from 'zod';
import { apiErrors, ERROR_MESSAGES, validateStatusCode } from './errors';
import { silentLogger, type Logger } from './logger';
import type { ApiEnvelope, ResponseInput, Result } from './types';
import {
    decodeWireBody,
    resolveSchema,
    type DateStrategy,
    type Schema,
    type WireSchema,
} from './wire';

export { validateStatusCode };

export interface ResponseHandlerOptions {
    logger?: Logger;

    /** Timestamp format expected in bodies. Default: 'fixed' */
    dateStrategy?: DateStrategy;

    /** Retry failed decodes with ISO-8601 timestamps. Default: false */
    recoverDates?: boolean;
}

// =============================================================================
// HELPERS
// =============================================================================

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Throws a TypeError when a byte body is not valid UTF-8.
 */
function bodyText(body: string | Uint8Array): string {
    return typeof body === 'string' ? body : utf8.decode(body);
}

function byteLength(body: string | Uint8Array | null | undefined): number | undefined {
    if (body === undefined || body === null) return undefined;
    if (typeof body === 'string') return new TextEncoder().encode(body).length;
    return body.byteLength;
}

const rawEnvelopeSchema = z.object({
    success: z.boolean(),
    data: z.unknown(),
    message: z.string().nullish(),
    error: z.string().nullish(),
});

/**
 * `null` fields count as absent. A present `data` must match the schema
 * whatever the value of `success`.
 */
function envelopeSchema<T>(data: Schema<T>): Schema<ApiEnvelope<T>> {
    return rawEnvelopeSchema.transform((envelope, ctx): ApiEnvelope<T> => {
        let payload: T | undefined;

        if (envelope.data !== undefined && envelope.data !== null) {
            const parsed = data.safeParse(envelope.data);
            if (!parsed.success) {
                for (const issue of parsed.error.issues) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: ['data', ...issue.path],
                        message: issue.message,
                    });
                }
                return z.NEVER;
            }
            payload = parsed.data;
        }

        return {
            success: envelope.success,
            data: payload,
            message: envelope.message ?? undefined,
            error: envelope.error ?? undefined,
        };
    });
}

// =============================================================================
// HANDLER FACTORY
// =============================================================================

/**
 * Creates a response handler.
 *
 * @example
 * const handler = createResponseHandler({ logger });
 * const result = handler.handleWrapped(
 *   { body, response: { status: 200, url, method: 'GET' } },
 *   foodLogSchema
 * );
 */
export function createResponseHandler(options: ResponseHandlerOptions = {}) {
    const {
        logger = silentLogger,
        dateStrategy = 'fixed',
        recoverDates = false,
    } = options;

    function logResponse(input: ResponseInput, status: number): void {
        const target = [input.response?.method, input.response?.url ?? 'unknown']
            .filter(Boolean)
            .join(' ');

        let message = `Response: [${status}] ${target}`;
        const size = byteLength(input.body);
        if (size !== undefined) {
            message += ` - Size: ${(size / 1024).toFixed(2)} KB`;
        }

        if (status >= 200 && status <= 299) {
            logger.info(message);
        } else {
            logger.error(message);
        }
    }

    /**
     * Steps 1-5: everything before schema decoding. Yields the body text on success.
     */
    function precheck(input: ResponseInput): Result<string> {
        if (input.error !== undefined && input.error !== null) {
            const error = apiErrors.networkFailure(input.error);
            logger.error(`Network error: ${String(error.details)}`);
            return { ok: false, error };
        }

        if (!input.response) {
            logger.error('No HTTP response received');
            return { ok: false, error: apiErrors.invalidResponse('No HTTP response received') };
        }

        const { status } = input.response;
        logResponse(input, status);

        const statusError = validateStatusCode(status);
        if (statusError) {
            return { ok: false, error: statusError };
        }

        const { body } = input;
        if (body === undefined || body === null || body.length === 0) {
            logger.warn('Empty response data');
            return { ok: false, error: apiErrors.invalidResponse('Empty response body') };
        }

        try {
            return { ok: true, data: bodyText(body) };
        } catch (err) {
            logger.error(`Decoding error: ${err instanceof Error ? err.message : String(err)}`);
            return { ok: false, error: apiErrors.decoding(err) };
        }
    }

    /**
     * Retries a failed decode with ISO-8601 timestamps. Gives up with the
     * original cause.
     */
    function attemptRecovery<T>(body: string, schema: WireSchema<T>, originalCause: unknown): Result<T> {
        logger.warn('Attempting error recovery for decoding');

        const outcome = decodeWireBody(body, schema, 'iso8601');
        if (outcome.ok) {
            logger.info('Error recovery successful with ISO-8601 timestamps');
            return { ok: true, data: outcome.value };
        }

        logger.error('Error recovery failed');
        return { ok: false, error: apiErrors.decoding(originalCause) };
    }

    function decode<T>(body: string, schema: WireSchema<T>): Result<T> {
        const outcome = decodeWireBody(body, schema, dateStrategy);
        if (outcome.ok) {
            logger.debug('Successfully decoded response');
            return { ok: true, data: outcome.value };
        }

        const cause = outcome.cause;
        logger.error(`Decoding error: ${cause instanceof Error ? cause.message : String(cause)}`);
        logger.debug(`Raw response: ${body}`);

        if (recoverDates && dateStrategy !== 'iso8601') {
            return attemptRecovery(body, schema, cause);
        }
        return { ok: false, error: apiErrors.decoding(cause) };
    }

    /**
     * Decodes the body directly into T.
     */
    function handle<T>(input: ResponseInput, schema: WireSchema<T>): Result<T> {
        const checked = precheck(input);
        if (!checked.ok) return checked;

        return decode(checked.data, schema);
    }

    /**
     * Decodes an ApiEnvelope<T> and returns its data.
     */
    function handleWrapped<T>(input: ResponseInput, schema: WireSchema<T>): Result<T> {
        const checked = precheck(input);
        if (!checked.ok) return checked;

        const decoded = decode(checked.data, dates => envelopeSchema(resolveSchema(schema, dates)));
        if (!decoded.ok) return decoded;

        const envelope = decoded.data;
        if (!envelope.success) {
            const message = envelope.error ?? envelope.message ?? ERROR_MESSAGES.generic;
            logger.error(`API returned error: ${message}`);
            return { ok: false, error: apiErrors.validation(message) };
        }

        if (envelope.data === undefined) {
            logger.error('API response missing data');
            return { ok: false, error: apiErrors.invalidResponse('Envelope has no data') };
        }

        return { ok: true, data: envelope.data };
    }

    /**
     * True when a response is present, 2xx and has a body.
     */
    function isValidResponse(input: Pick<ResponseInput, 'body' | 'response'>): boolean {
        if (!input.response) return false;
        if (validateStatusCode(input.response.status)) return false;
        return (byteLength(input.body) ?? 0) > 0;
    }

    /**
     * Pulls a display message out of an error body (`error`, then
     * `message`, then `detail`).
     */
    function extractErrorMessage(body: string | Uint8Array | null | undefined): string | undefined {
        if (!body || body.length === 0) return undefined;

        let parsed: unknown;
        try {
            parsed = JSON.parse(bodyText(body));
        } catch {
            // Not UTF-8 JSON; there is no message to show
            return undefined;
        }

        if (typeof parsed !== 'object' || parsed === null) return undefined;
        for (const key of ['error', 'message', 'detail'] as const) {
            if (key in parsed) {
                const value: unknown = Reflect.get(parsed, key);
                if (typeof value === 'string') return value;
            }
        }
        return undefined;
    }

    return {
        handle,
        handleWrapped,
        attemptRecovery,
        isValidResponse,
        extractErrorMessage,
    };
}

export type ResponseHandler = ReturnType<typeof createResponseHandler>;
