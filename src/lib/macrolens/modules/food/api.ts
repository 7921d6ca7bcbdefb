/**
 * Food Module - API Functions
 *
 * Food database lookups and user-defined foods.
 *
 * @module macrolens/modules/food/api
 */

import type { Result } from '../../../api-client';
import type { MacroLensClient } from '../../client';
import {
    foodListSchema,
    foodSchema,
    foodSearchResultSchema,
    type CustomFoodInput,
    type Food,
    type FoodSearchResult,
} from '../../types';

export const DEFAULT_SEARCH_LIMIT = 20;

export function createFoodApi(client: MacroLensClient) {
    return {
        /**
         * Search the food database by name or brand.
         *
         * @example
         * const result = await food.search('chicken', 20);
         * if (result.ok) {
         *   console.log(`${result.data.total} matches`);
         * }
         */
        search(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<Result<FoodSearchResult>> {
            return client.sendWrapped({ family: 'food', operation: 'search' }, foodSearchResultSchema, {
                query: { query, limit },
            });
        },

        details(id: string): Promise<Result<Food>> {
            return client.sendWrapped({ family: 'food', operation: 'details', params: { id } }, foodSchema);
        },

        /**
         * Most logged foods. Public, sent without a token.
         */
        popular(): Promise<Result<Food[]>> {
            return client.sendWrapped({ family: 'food', operation: 'popular' }, foodListSchema, {
                requiresAuth: false,
            });
        },

        /**
         * Upload a photo of a meal or a barcode and get back the foods it
         * was matched to.
         *
         * @example
         * const result = await food.scan(photo, { meal_type: 'lunch' });
         */
        scan(image: Blob, fields?: Record<string, string>): Promise<Result<Food[]>> {
            return client.sendWrapped({ family: 'food', operation: 'scan' }, foodListSchema, {
                upload: { data: image, fields },
            });
        },

        createCustom(input: CustomFoodInput): Promise<Result<Food>> {
            return client.sendWrapped({ family: 'food', operation: 'custom' }, foodSchema, { body: input });
        },
    };
}

export type FoodApi = ReturnType<typeof createFoodApi>;
