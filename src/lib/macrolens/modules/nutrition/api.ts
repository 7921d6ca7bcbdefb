/**
 * Nutrition Module - API Functions
 *
 * Daily targets and the nutrient totals measured against them.
 *
 * @module macrolens/modules/nutrition/api
 */

import type { Result } from '../../../api-client';
import type { MacroLensClient } from '../../client';
import {
    dailyNutritionSchema,
    macroBreakdownSchema,
    nutritionGoalsSchema,
    type DailyNutrition,
    type MacroBreakdown,
    type NutritionGoals,
    type NutritionGoalsInput,
} from '../../types';

export function createNutritionApi(client: MacroLensClient) {
    return {
        goals(): Promise<Result<NutritionGoals>> {
            return client.sendWrapped({ family: 'nutrition', operation: 'goals' }, nutritionGoalsSchema);
        },

        /**
         * @example
         * await nutrition.updateGoals({
         *   goalType: 'lose_weight',
         *   activityLevel: 'moderately_active',
         *   dailyCalories: 2000,
         *   dailyProtein: 150,
         *   dailyCarbs: 200,
         *   dailyFats: 67,
         * });
         */
        updateGoals(input: NutritionGoalsInput): Promise<Result<NutritionGoals>> {
            return client.sendWrapped({ family: 'nutrition', operation: 'updateGoals' }, nutritionGoalsSchema, {
                body: input,
            });
        },

        /** @param date - YYYY-MM-DD; today when omitted */
        daily(date?: string): Promise<Result<DailyNutrition>> {
            return client.sendWrapped({ family: 'nutrition', operation: 'daily' }, dailyNutritionSchema, {
                query: { date },
            });
        },

        /** @param date - YYYY-MM-DD; today when omitted */
        macroBreakdown(date?: string): Promise<Result<MacroBreakdown>> {
            return client.sendWrapped({ family: 'nutrition', operation: 'macroBreakdown' }, macroBreakdownSchema, {
                query: { date },
            });
        },
    };
}

export type NutritionApi = ReturnType<typeof createNutritionApi>;

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Share of a goal reached, as a whole percentage. A goal of zero or less
 * gives 0.
 */
export function goalProgress(consumed: number, goal: number): number {
    if (goal <= 0) return 0;
    return Math.round((consumed / goal) * 100);
}
