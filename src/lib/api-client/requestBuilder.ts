/**
 * Request Builder
 *
 * Turns a RequestSpec into a frozen OutboundRequest. Performs no I/O;
 * cancellation and timeouts are left to the transport, which reads
 * `timeoutMs` from the built request.
 *
 * @module api-client/requestBuilder
 */

import { apiErrors } from './errors';
import type { Logger } from './logger';
import type { AppInfo, OutboundRequest, QueryParams, RequestSpec, Result, UploadFile } from './types';
import { encodeWireBody } from './wire';

export const JSON_MEDIA_TYPE = 'application/json';

export const DEFAULT_UPLOAD_FILE_NAME = 'image.jpg';
export const DEFAULT_UPLOAD_MIME_TYPE = 'image/jpeg';

export interface BuildContext {
    /** Base URL including the API prefix, e.g. "http://localhost:8000/api/v1" */
    baseUrl: string;

    appInfo: AppInfo;

    /** Used when the RequestSpec has no timeoutMs */
    defaultTimeoutMs: number;

    /** Bearer token for this call, if the caller has one */
    accessToken?: string | null;

    logger?: Logger;
}

// =============================================================================
// HEADERS
// =============================================================================

/**
 * Sets a header, replacing any existing key that differs only in case.
 */
function setHeader(headers: Record<string, string>, key: string, value: string): void {
    const lower = key.toLowerCase();
    for (const existing of Object.keys(headers)) {
        if (existing.toLowerCase() === lower) {
            delete headers[existing];
        }
    }
    headers[key] = value;
}

function buildHeaders(spec: RequestSpec, context: BuildContext): Record<string, string> {
    const headers: Record<string, string> = {};
    const { appInfo, accessToken } = context;

    // fetch sets the multipart Content-Type with its boundary
    if (!isUpload(spec)) {
        setHeader(headers, 'Content-Type', JSON_MEDIA_TYPE);
    }
    setHeader(headers, 'Accept', JSON_MEDIA_TYPE);
    setHeader(headers, 'X-App-Version', appInfo.version);
    setHeader(headers, 'X-Build-Number', appInfo.build);
    setHeader(headers, 'X-Platform', appInfo.platform);
    setHeader(headers, 'X-OS-Version', appInfo.osVersion);

    // No token with requiresAuth is passed through; the server decides
    if ((spec.requiresAuth ?? true) && accessToken) {
        setHeader(headers, 'Authorization', `Bearer ${accessToken}`);
    }

    for (const [key, value] of Object.entries(spec.headers ?? {})) {
        setHeader(headers, key, value);
    }

    return headers;
}

// =============================================================================
// URL
// =============================================================================

const DOT_SEGMENT = /^(?:\.|%2e){1,2}$/i;

/**
 * URL parsers (fetch included) resolve "." and ".." segments, which would
 * send the request to a different resource than the path names.
 */
function hasDotSegment(path: string): boolean {
    const [pathname = ''] = path.split(/[?#]/, 1);
    return pathname.split(/[/\\]/).some(segment => DOT_SEGMENT.test(segment));
}

function queryString(query?: QueryParams): string {
    const search = new URLSearchParams();

    for (const [key, value] of Object.entries(query ?? {})) {
        if (value !== undefined && value !== '') {
            search.append(key, String(value));
        }
    }

    const encoded = search.toString();
    return encoded ? `?${encoded}` : '';
}

// =============================================================================
// BODY
// =============================================================================

function isUpload(spec: RequestSpec): boolean {
    return spec.upload !== undefined && (spec.method ?? 'GET') !== 'GET';
}

function buildForm(upload: UploadFile): FormData {
    const form = new FormData();
    const file = new Blob([upload.data], { type: upload.mimeType ?? DEFAULT_UPLOAD_MIME_TYPE });

    form.append('file', file, upload.fileName ?? DEFAULT_UPLOAD_FILE_NAME);
    for (const [key, value] of Object.entries(upload.fields ?? {})) {
        form.append(key, value);
    }
    return form;
}

// =============================================================================
// BUILD
// =============================================================================

/**
 * Builds an outbound request.
 *
 * @example
 * const built = buildRequest(
 *   { path: '/food/search', query: { query: 'oats', limit: 20 } },
 *   { baseUrl: 'http://localhost:8000/api/v1', appInfo, defaultTimeoutMs: 30000, accessToken: token }
 * );
 * if (built.ok) {
 *   console.log(built.data.url); // http://localhost:8000/api/v1/food/search?query=oats&limit=20
 * }
 */
export function buildRequest(spec: RequestSpec, context: BuildContext): Result<OutboundRequest> {
    const method = spec.method ?? 'GET';
    const path = spec.path.startsWith('/') ? spec.path : `/${spec.path}`;

    if (hasDotSegment(path)) {
        return { ok: false, error: apiErrors.invalidEndpoint(path, new Error('Path contains a dot segment')) };
    }

    const target = `${context.baseUrl}${path}`;
    try {
        // Parsed only to validate; the request keeps the text as written
        new URL(target);
    } catch (err) {
        return { ok: false, error: apiErrors.invalidEndpoint(path, err) };
    }

    const url = method === 'GET' ? `${target}${queryString(spec.query)}` : target;

    let body: string | FormData | undefined;
    if (spec.upload && isUpload(spec)) {
        body = buildForm(spec.upload);
    } else if (spec.body !== undefined && method !== 'GET') {
        try {
            body = encodeWireBody(spec.body);
        } catch (err) {
            return { ok: false, error: apiErrors.encodingFailed(err) };
        }
    }

    const request: OutboundRequest = {
        url,
        method,
        headers: Object.freeze(buildHeaders(spec, context)),
        timeoutMs: spec.timeoutMs ?? context.defaultTimeoutMs,
        ...(body !== undefined ? { body } : {}),
    };

    context.logger?.debug(`Built request: ${method} ${request.url}`);

    return { ok: true, data: Object.freeze(request) };
}
