import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
    camelToSnake,
    snakeToCamel,
    convertKeys,
    formatTimestamp,
    parseTimestamp,
    encodeWireBody,
    decodeWireBody,
    type DateCodec,
} from '../wire';

// =============================================================================
// KEY CONVERSION
// =============================================================================

describe('camelToSnake', () => {
    it('splits on word boundaries and lowercases', () => {
        expect(camelToSnake('dailyProtein')).toBe('daily_protein');
        expect(camelToSnake('weeklyWeightChange')).toBe('weekly_weight_change');
    });

    it('keeps acronyms together', () => {
        expect(camelToSnake('imageURLSmall')).toBe('image_url_small');
    });

    it('leaves single words alone', () => {
        expect(camelToSnake('id')).toBe('id');
    });
});

describe('snakeToCamel', () => {
    it('capitalises every word after the first', () => {
        expect(snakeToCamel('logged_at')).toBe('loggedAt');
        expect(snakeToCamel('daily_water_goal')).toBe('dailyWaterGoal');
    });

    it('lowercases the rest of inner words', () => {
        expect(snakeToCamel('user_ID')).toBe('userId');
    });

    it('keeps leading and trailing underscores', () => {
        expect(snakeToCamel('_internal_id')).toBe('_internalId');
        expect(snakeToCamel('trailing_')).toBe('trailing_');
    });

    it('leaves keys without underscores unchanged', () => {
        expect(snakeToCamel('calories')).toBe('calories');
    });
});

describe('convertKeys', () => {
    it('renames keys of nested objects and arrays', () => {
        const wire = { food_log: { logged_at: 1, items: [{ meal_type: 'lunch' }] } };

        expect(convertKeys(wire, snakeToCamel)).toEqual({
            foodLog: { loggedAt: 1, items: [{ mealType: 'lunch' }] },
        });
    });

    it('returns primitives as they are', () => {
        expect(convertKeys('meal_type', snakeToCamel)).toBe('meal_type');
        expect(convertKeys(null, snakeToCamel)).toBeNull();
    });
});

// =============================================================================
// TIMESTAMPS
// =============================================================================

describe('formatTimestamp', () => {
    it('writes UTC with six fractional digits', () => {
        const date = new Date(Date.UTC(2024, 2, 5, 8, 30, 0, 250));

        expect(formatTimestamp(date)).toBe('2024-03-05T08:30:00.250000');
    });
});

describe('parseTimestamp', () => {
    it('reads the fixed format as UTC', () => {
        const date = parseTimestamp('2024-03-05T08:30:00.250000', 'fixed');

        expect(date?.toISOString()).toBe('2024-03-05T08:30:00.250Z');
    });

    it('rejects ISO-8601 text under the fixed strategy', () => {
        expect(parseTimestamp('2024-03-05T08:30:00Z', 'fixed')).toBeNull();
    });

    it('rejects out-of-range fields instead of rolling over', () => {
        expect(parseTimestamp('2024-02-30T00:00:00.000000', 'fixed')).toBeNull();
    });

    it('applies the zone offset under iso8601', () => {
        const date = parseTimestamp('2024-03-05T14:00:00+05:30', 'iso8601');

        expect(date?.toISOString()).toBe('2024-03-05T08:30:00.000Z');
    });

    it('truncates long fractions to milliseconds', () => {
        const date = parseTimestamp('2024-03-05T08:30:00.123456Z', 'iso8601');

        expect(date?.toISOString()).toBe('2024-03-05T08:30:00.123Z');
    });

    it('requires a zone designator under iso8601', () => {
        expect(parseTimestamp('2024-03-05T08:30:00', 'iso8601')).toBeNull();
        expect(parseTimestamp('2024-03-05T08:30:00.250000', 'iso8601')).toBeNull();
    });
});

// =============================================================================
// ENCODING
// =============================================================================

describe('encodeWireBody', () => {
    it('converts keys and dates, and drops undefined fields', () => {
        const body = encodeWireBody({
            foodId: 'f1',
            loggedAt: new Date(Date.UTC(2024, 0, 2, 12)),
            notes: undefined,
        });

        expect(body).toBe('{"food_id":"f1","logged_at":"2024-01-02T12:00:00.000000"}');
    });

    it('allows the same object twice when it is not a cycle', () => {
        const shared = { grams: 1 };

        expect(encodeWireBody({ first: shared, second: shared })).toBe('{"first":{"grams":1},"second":{"grams":1}}');
    });

    it('throws on circular structures', () => {
        const node: Record<string, unknown> = { name: 'loop' };
        node.self = node;

        expect(() => encodeWireBody(node)).toThrow('Cannot encode circular structure at $.self');
    });

    it('throws on values JSON cannot carry', () => {
        expect(() => encodeWireBody({ count: 10n })).toThrow('Cannot encode a bigint at $.count');
        expect(() => encodeWireBody({ ratio: Number.NaN })).toThrow('Cannot encode non-finite number NaN at $.ratio');
        expect(() => encodeWireBody({ at: new Date(Number.NaN) })).toThrow('Invalid date at $.at');
    });
});

// =============================================================================
// DECODING
// =============================================================================

describe('decodeWireBody', () => {
    const schema = (dates: DateCodec) => z.object({
        foodId: z.string(),
        loggedAt: dates.timestamp,
    });

    it('converts keys and parses timestamps', () => {
        const outcome = decodeWireBody(
            '{"food_id":"f1","logged_at":"2024-01-02T12:00:00.000000"}',
            schema,
            'fixed'
        );

        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect(outcome.value.foodId).toBe('f1');
            expect(outcome.value.loggedAt.toISOString()).toBe('2024-01-02T12:00:00.000Z');
        }
    });

    it('fails with a zod error when a timestamp does not match the strategy', () => {
        const outcome = decodeWireBody('{"food_id":"f1","logged_at":"2024-01-02T12:00:00Z"}', schema, 'fixed');

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.cause).toBeInstanceOf(z.ZodError);
        }
    });

    it('fails with the parse error on malformed JSON', () => {
        const outcome = decodeWireBody('{not json', schema, 'fixed');

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.cause).toBeInstanceOf(SyntaxError);
        }
    });
});
