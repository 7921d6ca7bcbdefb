/**
 * API Client Types
 *
 * Core types shared by the request pipeline:
 * - Result<T>: discriminated union for success/error handling
 * - ApiError: classified error with a closed set of codes
 * - OutboundRequest: immutable request value produced by the builder
 * - ResponseInput: what the transport hands to the response handler
 *
 * @module api-client/types
 */

// =============================================================================
// RESULT TYPE
// =============================================================================

/**
 * Standard Result type for every pipeline operation.
 *
 * @example
 * const result = await api.foodLogs.today();
 * if (result.ok) {
 *   console.log(result.data.length);
 * } else {
 *   console.error(result.error.message);
 * }
 */
export type Result<T> =
    | { ok: true; data: T }
    | { ok: false; error: ApiError };

// =============================================================================
// API ERROR
// =============================================================================

/**
 * Classified pipeline error. Exactly one is produced per failed call;
 * no error carries partial success data.
 */
export interface ApiError {
    /** Machine-readable error code for programmatic handling */
    code: ApiErrorCode;

    /** Human-readable error message for display */
    message: string;

    /** Additional context (server body, underlying error text) */
    details?: unknown;

    /** Whether the request can be safely retried */
    retriable: boolean;

    /** HTTP status code when the error came from one */
    statusCode?: number;

    /** Underlying transport or parse failure */
    cause?: unknown;
}

/**
 * Response-side codes come from the response handler, the last two from
 * the request builder.
 */
export type ApiErrorCode =
    | 'NETWORK_ERROR'      // Transport-level failure (includes timeouts)
    | 'INVALID_RESPONSE'   // No response, empty body, or envelope without data
    | 'UNAUTHORIZED'       // 401
    | 'FORBIDDEN'          // 403
    | 'NOT_FOUND'          // 404
    | 'VALIDATION_ERROR'   // Other 4xx, or envelope with success: false
    | 'SERVER_ERROR'       // 5xx
    | 'DECODING_ERROR'     // Body did not match the expected shape
    | 'UNKNOWN'            // Anything else (1xx/3xx reaching the handler)
    | 'INVALID_ENDPOINT'   // Base URL + path is not a well-formed URL
    | 'ENCODING_FAILED';   // Payload could not be serialized

// =============================================================================
// HTTP TYPES
// =============================================================================

/** Supported HTTP methods */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/**
 * Endpoint definition for a registry entry.
 */
export interface EndpointDefinition {
    /** HTTP method for this endpoint */
    method: HttpMethod;

    /** Path template (e.g., "/food/logs/{id}") */
    path: string;

    /** Description for documentation */
    description: string;
}

/**
 * Path parameters for template interpolation.
 * @example { id: '42' }
 */
export type PathParams = Record<string, string>;

/**
 * Query parameters appended to read requests.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Static app information sent with every request.
 */
export interface AppInfo {
    version: string;
    build: string;
    platform: string;
    osVersion: string;
}

// =============================================================================
// REQUEST / RESPONSE VALUES
// =============================================================================

/**
 * Everything the request builder needs for one call, given in a single
 * record so there is no partially configured builder.
 */
export interface RequestSpec {
    /** Path relative to the base URL; a missing leading slash is added */
    path: string;

    /** Default: GET */
    method?: HttpMethod;

    /** Structured payload, encoded as the JSON body of non-GET requests */
    body?: unknown;

    /** File sent as multipart form data instead of a JSON body */
    upload?: UploadFile;

    /** Only used for GET requests */
    query?: QueryParams;

    /** Overrides default headers on (case-insensitive) collision */
    headers?: Record<string, string>;

    /** Default: true */
    requiresAuth?: boolean;

    /** Overrides the default request timeout (milliseconds) */
    timeoutMs?: number;
}

/**
 * Multipart upload: the file goes in the "file" part, followed by any
 * extra text fields.
 */
export interface UploadFile {
    data: Blob;

    /** Default: "image.jpg" */
    fileName?: string;

    /** Default: "image/jpeg" */
    mimeType?: string;

    fields?: Record<string, string>;
}

/**
 * Fully built request. Frozen once constructed.
 */
export interface OutboundRequest {
    readonly url: string;
    readonly method: HttpMethod;
    readonly headers: Readonly<Record<string, string>>;
    /** JSON text, or form data for uploads */
    readonly body?: string | FormData;
    readonly timeoutMs: number;
}

/**
 * Response metadata as seen by the response handler.
 */
export interface RawResponse {
    status: number;
    url?: string;
    method?: HttpMethod;
}

/**
 * Outcome of one transport call.
 */
export interface ResponseInput {
    body?: string | Uint8Array | null;
    response?: RawResponse | null;
    error?: unknown;
}

/**
 * Generic success envelope used by wrapped endpoints.
 */
export interface ApiEnvelope<T> {
    success: boolean;
    data?: T;
    message?: string;
    error?: string;
}

// =============================================================================
// CLIENT CONFIGURATION
// =============================================================================

/**
 * Per-call transport options.
 */
export interface SendOptions {
    /** Number of retry attempts for retriable errors. Default: client default */
    retries?: number;

    /** Delay between retries in milliseconds. Default: client default */
    retryDelay?: number;

    /** Whether to use exponential backoff for retries. Default: true */
    exponentialBackoff?: boolean;

    /** AbortSignal for request cancellation */
    signal?: AbortSignal;
}

/**
 * Context passed to the onError callback.
 */
export interface ErrorContext {
    /** HTTP method of the failed request */
    method: HttpMethod;

    /** URL of the failed request (the path when the URL could not be built) */
    url: string;

    /** Attempt number (1 = first try, 2 = first retry, etc.) */
    attempt: number;
}

// =============================================================================
// HELPER TYPES
// =============================================================================

/**
 * Extract the data type from a Result.
 * @example type Logs = ExtractData<Result<FoodLog[]>>; // FoodLog[]
 */
export type ExtractData<R> = R extends Result<infer T> ? T : never;
