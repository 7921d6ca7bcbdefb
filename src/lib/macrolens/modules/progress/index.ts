/**
 * Progress Module
 *
 * @module macrolens/modules/progress
 */

// API functions
export { createProgressApi, type ProgressApi } from './api';

// React hooks
export { useProgressStats, type UseProgressStatsReturn } from './hooks';
