/**
 * Nutrition Module
 *
 * @module macrolens/modules/nutrition
 */

// API functions
export { createNutritionApi, goalProgress, type NutritionApi } from './api';

// React hooks
export { useDailyNutrition, type DailyNutritionView, type UseDailyNutritionReturn } from './hooks';
