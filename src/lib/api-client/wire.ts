/**
 * Wire Codec
 *
 * JSON bodies on the wire use snake_case keys and UTC timestamps in the
 * fixed format `yyyy-MM-ddTHH:mm:ss.SSSSSS`. In code, keys are camelCase and
 * timestamps are `Date`s.
 *
 * Some environments send ISO-8601 timestamps with a zone designator instead.
 * That is a known inconsistency of the API; the response handler only
 * decodes them when date recovery is switched on.
 *
 * @module api-client/wire
 */

import { z } from 'zod';

// =============================================================================
// KEY CONVERSION
// =============================================================================

/**
 * @example camelToSnake('dailyProtein') // 'daily_protein'
 * @example camelToSnake('imageURLSmall') // 'image_url_small'
 */
export function camelToSnake(key: string): string {
    return key
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .toLowerCase();
}

/**
 * Leading and trailing underscores are kept; every inner word after the
 * first is capitalised.
 *
 * @example snakeToCamel('logged_at') // 'loggedAt'
 * @example snakeToCamel('_internal_id') // '_internalId'
 */
export function snakeToCamel(key: string): string {
    if (!key.includes('_')) return key;

    const match = /^(_*)(.*?)(_*)$/.exec(key);
    if (!match) return key;
    const [, leading, core, trailing] = match;
    if (core === '') return key;

    const words = core.split('_').filter(word => word.length > 0);
    const [first, ...rest] = words;
    const camel = first + rest
        .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join('');

    return `${leading}${camel}${trailing}`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const proto = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Recursively renames the keys of plain objects. Arrays are walked;
 * everything else is returned as is.
 */
export function convertKeys(value: unknown, convert: (key: string) => string): unknown {
    if (Array.isArray(value)) {
        return value.map(item => convertKeys(item, convert));
    }
    if (isPlainObject(value)) {
        const out: Record<string, unknown> = {};
        for (const [key, item] of Object.entries(value)) {
            out[convert(key)] = convertKeys(item, convert);
        }
        return out;
    }
    return value;
}

// =============================================================================
// TIMESTAMPS
// =============================================================================

export type DateStrategy = 'fixed' | 'iso8601';

const FIXED_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{6})$/;
const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})$/;

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

/**
 * Formats a date as `yyyy-MM-ddTHH:mm:ss.SSSSSS` in UTC. Sub-millisecond
 * digits are always zero.
 */
export function formatTimestamp(date: Date): string {
    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`
        + `T${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}`
        + `.${pad(date.getUTCMilliseconds() * 1000, 6)}`;
}

function utcDate(parts: number[], offsetMinutes: number): Date | null {
    const [year, month, day, hours, minutes, seconds, millis] = parts;
    const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));

    // Date.UTC rolls over out-of-range fields; reject those instead
    if (
        date.getUTCFullYear() !== year
        || date.getUTCMonth() !== month - 1
        || date.getUTCDate() !== day
        || date.getUTCHours() !== hours
        || date.getUTCMinutes() !== minutes
        || date.getUTCSeconds() !== seconds
    ) {
        return null;
    }
    return new Date(date.getTime() - offsetMinutes * 60_000);
}

function fractionToMillis(fraction: string | undefined): number {
    if (!fraction) return 0;
    return Number(fraction.slice(0, 3).padEnd(3, '0'));
}

function parseOffset(designator: string): number {
    if (designator === 'Z') return 0;
    const sign = designator.startsWith('-') ? -1 : 1;
    const digits = designator.slice(1).replace(':', '');
    return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Parses a timestamp under the given strategy. Returns null when the text
 * does not match it.
 *
 * @example parseTimestamp('2024-03-05T08:30:00.250000', 'fixed')
 * @example parseTimestamp('2024-03-05T14:00:00+05:30', 'iso8601')
 */
export function parseTimestamp(value: string, strategy: DateStrategy): Date | null {
    if (strategy === 'fixed') {
        const match = FIXED_TIMESTAMP.exec(value);
        if (!match) return null;
        const numbers = match.slice(1, 7).map(Number);
        return utcDate([...numbers, fractionToMillis(match[7])], 0);
    }

    const match = ISO_TIMESTAMP.exec(value);
    if (!match) return null;
    const numbers = match.slice(1, 7).map(Number);
    return utcDate([...numbers, fractionToMillis(match[7])], parseOffset(match[8]));
}

// =============================================================================
// SCHEMAS
// =============================================================================

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Schema pieces that depend on the active timestamp strategy.
 */
export interface DateCodec {
    strategy: DateStrategy;
    timestamp: Schema<Date>;
}

/**
 * A decoding target: either a plain schema, or a function of the date codec
 * for shapes that contain timestamps.
 *
 * @example
 * const entrySchema: WireSchema<ProgressEntry> = dates => z.object({
 *   weight: z.number(),
 *   recordedAt: dates.timestamp,
 * });
 */
export type WireSchema<T> = Schema<T> | ((dates: DateCodec) => Schema<T>);

export function dateCodec(strategy: DateStrategy): DateCodec {
    return {
        strategy,
        timestamp: z.string().transform((value, ctx) => {
            const date = parseTimestamp(value, strategy);
            if (!date) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Expected a ${strategy} timestamp, received "${value}"`,
                });
                return z.NEVER;
            }
            return date;
        }),
    };
}

export function resolveSchema<T>(schema: WireSchema<T>, dates: DateCodec): Schema<T> {
    return typeof schema === 'function' ? schema(dates) : schema;
}

// =============================================================================
// ENCODING
// =============================================================================

function toWire(value: unknown, path: string, ancestors: Set<object>): unknown {
    if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) {
            throw new TypeError(`Invalid date at ${path}`);
        }
        return formatTimestamp(value);
    }

    if (value === null || typeof value !== 'object') {
        if (typeof value === 'bigint' || typeof value === 'function' || typeof value === 'symbol') {
            throw new TypeError(`Cannot encode a ${typeof value} at ${path}`);
        }
        if (typeof value === 'number' && !Number.isFinite(value)) {
            throw new TypeError(`Cannot encode non-finite number ${value} at ${path}`);
        }
        return value;
    }

    if (ancestors.has(value)) {
        throw new TypeError(`Cannot encode circular structure at ${path}`);
    }
    ancestors.add(value);

    try {
        if (Array.isArray(value)) {
            return value.map((item, index) => toWire(item, `${path}[${index}]`, ancestors));
        }

        const out: Record<string, unknown> = {};
        for (const [key, item] of Object.entries(value)) {
            if (item === undefined) continue;
            out[camelToSnake(key)] = toWire(item, `${path}.${key}`, ancestors);
        }
        return out;
    } finally {
        ancestors.delete(value);
    }
}

/**
 * Serializes a payload to a wire JSON body. Throws TypeError for values
 * JSON cannot carry.
 *
 * @example
 * encodeWireBody({ foodId: 'f1', loggedAt: new Date(Date.UTC(2024, 0, 2, 12)) })
 * // '{"food_id":"f1","logged_at":"2024-01-02T12:00:00.000000"}'
 */
export function encodeWireBody(payload: unknown): string {
    return JSON.stringify(toWire(payload, '$', new Set()));
}

// =============================================================================
// DECODING
// =============================================================================

export type DecodeOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; cause: unknown };

/**
 * Parses a wire JSON body, converts its keys to camelCase and validates it
 * against the schema under the given timestamp strategy.
 */
export function decodeWireBody<T>(
    text: string,
    schema: WireSchema<T>,
    strategy: DateStrategy
): DecodeOutcome<T> {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        return { ok: false, cause: err };
    }

    const parsed = resolveSchema(schema, dateCodec(strategy)).safeParse(convertKeys(raw, snakeToCamel));
    if (parsed.success) {
        return { ok: true, value: parsed.data };
    }
    return { ok: false, cause: parsed.error };
}
