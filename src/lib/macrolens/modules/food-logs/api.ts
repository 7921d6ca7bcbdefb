/**
 * Food Logs Module - API Functions
 *
 * The user's food diary: entries per meal and the daily totals against goals.
 *
 * @module macrolens/modules/food-logs/api
 */

import type { Result } from '../../../api-client';
import type { MacroLensClient } from '../../client';
import {
    dailySummarySchema,
    deletedSchema,
    foodLogListSchema,
    foodLogSchema,
    type DailySummary,
    type FoodLog,
    type FoodLogInput,
    type FoodLogQuery,
} from '../../types';

export function createFoodLogsApi(client: MacroLensClient) {
    return {
        list(query: FoodLogQuery = {}): Promise<Result<FoodLog[]>> {
            return client.sendWrapped({ family: 'foodLogs', operation: 'list' }, foodLogListSchema, {
                query: { meal_type: query.mealType, page: query.page, limit: query.limit },
            });
        },

        today(): Promise<Result<FoodLog[]>> {
            return client.sendWrapped({ family: 'foodLogs', operation: 'today' }, foodLogListSchema);
        },

        /**
         * @param date - YYYY-MM-DD, inserted into the path as given
         */
        byDate(date: string): Promise<Result<FoodLog[]>> {
            return client.sendWrapped(
                { family: 'foodLogs', operation: 'byDate', params: { date } },
                foodLogListSchema
            );
        },

        get(id: string): Promise<Result<FoodLog>> {
            return client.sendWrapped({ family: 'foodLogs', operation: 'details', params: { id } }, foodLogSchema);
        },

        /**
         * @example
         * await foodLogs.create({ foodId: 'food-1', mealType: 'lunch', servings: 1.5 });
         */
        create(input: FoodLogInput): Promise<Result<FoodLog>> {
            return client.sendWrapped({ family: 'foodLogs', operation: 'create' }, foodLogSchema, { body: input });
        },

        update(id: string, changes: Partial<FoodLogInput>): Promise<Result<FoodLog>> {
            return client.sendWrapped(
                { family: 'foodLogs', operation: 'update', params: { id } },
                foodLogSchema,
                { body: changes }
            );
        },

        /**
         * Resolves to the removed entry's id.
         */
        async remove(id: string): Promise<Result<string>> {
            const result = await client.sendWrapped(
                { family: 'foodLogs', operation: 'delete', params: { id } },
                deletedSchema
            );
            return result.ok ? { ok: true, data: result.data.id } : result;
        },

        /**
         * @param date - YYYY-MM-DD; the server uses today when omitted
         */
        dailySummary(date?: string): Promise<Result<DailySummary>> {
            return client.sendWrapped({ family: 'foodLogs', operation: 'dailySummary' }, dailySummarySchema, {
                query: { date },
            });
        },
    };
}

export type FoodLogsApi = ReturnType<typeof createFoodLogsApi>;
