/**
 * MacroLens domain types
 *
 * Response shapes are zod schemas (camelCase, after key conversion) with
 * their inferred types. Shapes containing timestamps are functions of the
 * date codec so the response handler can decode them under either
 * timestamp strategy.
 *
 * @module macrolens/types
 */

import { z } from 'zod';
import type { DateCodec } from '../api-client';

// =============================================================================
// SHARED ENUMS
// =============================================================================

export const mealTypeSchema = z.enum(['breakfast', 'lunch', 'dinner', 'snack']);
export type MealType = z.infer<typeof mealTypeSchema>;

export const goalTypeSchema = z.enum(['lose_weight', 'maintain_weight', 'gain_weight', 'build_muscle']);
export type GoalType = z.infer<typeof goalTypeSchema>;

export const activityLevelSchema = z.enum([
    'sedentary',
    'lightly_active',
    'moderately_active',
    'very_active',
    'extra_active',
]);
export type ActivityLevel = z.infer<typeof activityLevelSchema>;

// =============================================================================
// FOOD
// =============================================================================

export const foodSchema = z.object({
    id: z.string(),
    name: z.string(),
    brand: z.string().nullish(),
    servingSize: z.string(),
    calories: z.number().nonnegative(),
    protein: z.number().nonnegative(),
    carbs: z.number().nonnegative(),
    fats: z.number().nonnegative(),
    fiber: z.number().nonnegative().nullish(),
});
export type Food = z.infer<typeof foodSchema>;

export const foodListSchema = z.array(foodSchema);

export const foodSearchResultSchema = z.object({
    results: z.array(foodSchema),
    total: z.number().int().nonnegative(),
});
export type FoodSearchResult = z.infer<typeof foodSearchResultSchema>;

export interface CustomFoodInput {
    name: string;
    brand?: string;
    servingSize: string;
    calories: number;
    protein: number;
    carbs: number;
    fats: number;
    fiber?: number;
}

// =============================================================================
// FOOD LOGS
// =============================================================================

export const foodLogSchema = (dates: DateCodec) => z.object({
    id: z.string(),
    foodId: z.string(),
    food: foodSchema.nullish(),
    mealType: mealTypeSchema,
    servings: z.number().positive(),
    calories: z.number().nonnegative(),
    protein: z.number().nonnegative(),
    carbs: z.number().nonnegative(),
    fats: z.number().nonnegative(),
    notes: z.string().nullish(),
    loggedAt: dates.timestamp,
});
export type FoodLog = z.infer<ReturnType<typeof foodLogSchema>>;

export const foodLogListSchema = (dates: DateCodec) => z.array(foodLogSchema(dates));

export interface FoodLogInput {
    foodId: string;
    mealType: MealType;
    servings: number;
    /** Defaults to the server's current time */
    loggedAt?: Date;
    notes?: string;
}

export interface FoodLogQuery {
    mealType?: MealType;
    page?: number;
    limit?: number;
}

export const dailySummarySchema = z.object({
    date: z.string(),
    totalCalories: z.number(),
    totalProtein: z.number(),
    totalCarbs: z.number(),
    totalFats: z.number(),
    calorieGoal: z.number(),
    proteinGoal: z.number(),
    carbsGoal: z.number(),
    fatsGoal: z.number(),
    mealCount: z.number().int().nonnegative(),
});
export type DailySummary = z.infer<typeof dailySummarySchema>;

// Deleting returns an envelope without meaningful data
export const deletedSchema = z.object({ id: z.string() });

// =============================================================================
// NUTRITION
// =============================================================================

export const nutritionGoalsSchema = (dates: DateCodec) => z.object({
    id: z.string(),
    userId: z.string(),
    goalType: goalTypeSchema,
    targetWeight: z.number().nullish(),
    weeklyWeightChange: z.number().nullish(),
    activityLevel: activityLevelSchema,
    dailyCalories: z.number().int(),
    dailyProtein: z.number(),
    dailyCarbs: z.number(),
    dailyFats: z.number(),
    dailyWater: z.number().int().nullish(),
    createdAt: dates.timestamp,
    updatedAt: dates.timestamp,
});
export type NutritionGoals = z.infer<ReturnType<typeof nutritionGoalsSchema>>;

export interface NutritionGoalsInput {
    goalType: GoalType;
    targetWeight?: number;
    weeklyWeightChange?: number;
    activityLevel: ActivityLevel;
    dailyCalories: number;
    dailyProtein: number;
    dailyCarbs: number;
    dailyFats: number;
    dailyWater?: number;
}

export const dailyNutritionSchema = z.object({
    date: z.string(),
    calories: z.number(),
    protein: z.number(),
    carbs: z.number(),
    fats: z.number(),
    fiber: z.number().nullish(),
    water: z.number().nullish(),
});
export type DailyNutrition = z.infer<typeof dailyNutritionSchema>;

export const macroBreakdownSchema = z.object({
    date: z.string(),
    proteinCalories: z.number(),
    carbsCalories: z.number(),
    fatsCalories: z.number(),
    proteinPercentage: z.number(),
    carbsPercentage: z.number(),
    fatsPercentage: z.number(),
});
export type MacroBreakdown = z.infer<typeof macroBreakdownSchema>;

// =============================================================================
// PROGRESS
// =============================================================================

export const progressEntrySchema = (dates: DateCodec) => z.object({
    id: z.string(),
    weight: z.number().positive(),
    bodyFatPercentage: z.number().nullish(),
    notes: z.string().nullish(),
    recordedAt: dates.timestamp,
});
export type ProgressEntry = z.infer<ReturnType<typeof progressEntrySchema>>;

export const progressEntryListSchema = (dates: DateCodec) => z.array(progressEntrySchema(dates));

export interface ProgressEntryInput {
    /** Kilograms */
    weight: number;
    bodyFatPercentage?: number;
    notes?: string;
    recordedAt?: Date;
}

export interface ProgressHistoryQuery {
    /** YYYY-MM-DD */
    from?: string;
    /** YYYY-MM-DD */
    to?: string;
}

export const progressStatsSchema = z.object({
    startWeight: z.number(),
    currentWeight: z.number(),
    totalChange: z.number(),
    weeklyAverageChange: z.number(),
    entryCount: z.number().int().nonnegative(),
    streakDays: z.number().int().nonnegative(),
});
export type ProgressStats = z.infer<typeof progressStatsSchema>;
