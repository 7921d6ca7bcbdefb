/**
 * Food Module
 *
 * @module macrolens/modules/food
 */

// API functions
export { createFoodApi, DEFAULT_SEARCH_LIMIT, type FoodApi } from './api';

// React hooks
export { useFoodSearch, type UseFoodSearchOptions, type UseFoodSearchReturn } from './hooks';
