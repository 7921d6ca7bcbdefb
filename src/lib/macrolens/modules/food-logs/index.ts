/**
 * Food Logs Module
 *
 * @module macrolens/modules/food-logs
 */

// API functions
export { createFoodLogsApi, type FoodLogsApi } from './api';

// React hooks
export {
    useTodayLogs,
    useLogFood,
    type UseTodayLogsReturn,
    type UseLogFoodOptions,
    type UseLogFoodReturn,
} from './hooks';
