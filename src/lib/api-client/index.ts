/**
 * API Client - Public Exports
 *
 * @module api-client
 */

// Transport
export { createApiClient, type ApiClient, type ApiClientConfig, type VerbOptions } from './client';

// Pipeline
export { buildRequest, JSON_MEDIA_TYPE, type BuildContext } from './requestBuilder';
export {
    createResponseHandler,
    type ResponseHandler,
    type ResponseHandlerOptions,
} from './responseHandler';
export {
    apiErrors,
    ApiRequestError,
    ERROR_MESSAGES,
    isApiError,
    unwrap,
    validateStatusCode,
} from './errors';

// Wire format
export {
    camelToSnake,
    snakeToCamel,
    convertKeys,
    formatTimestamp,
    parseTimestamp,
    dateCodec,
    encodeWireBody,
    decodeWireBody,
    type DateCodec,
    type DateStrategy,
    type Schema,
    type WireSchema,
} from './wire';

// Logging
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './logger';

// Request state utilities
export {
    idleState,
    loadingState,
    emptyState,
    toRequestState,
    mapRequestState,
    renderRequestState,
    combineRequestStates,
    type RequestState,
    type RequestStateHandlers,
} from './requestState';

// Types
export type {
    Result,
    ApiError,
    ApiErrorCode,
    ApiEnvelope,
    AppInfo,
    EndpointDefinition,
    ErrorContext,
    ExtractData,
    HttpMethod,
    OutboundRequest,
    PathParams,
    QueryParams,
    RawResponse,
    RequestSpec,
    ResponseInput,
    SendOptions,
    UploadFile,
} from './types';
