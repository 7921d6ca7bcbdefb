/**
 * Wire fixtures and a test instance factory for the MacroLens tests.
 */

import { vi } from 'vitest';
import { silentLogger } from '../../api-client';
import { createMacroLensApi } from '../api';
import { loadAppConfig } from '../config';

export const TEST_CONFIG = loadAppConfig({ MACROLENS_APP_VERSION: '1.0.0', MACROLENS_OS_VERSION: '17.4' });

export const BASE_URL = 'http://localhost:8000/api/v1';

export function envelope(data: unknown) {
    return { success: true, data };
}

export const wireFood = {
    id: 'f1',
    name: 'Rolled oats',
    brand: null,
    serving_size: '40 g',
    calories: 150,
    protein: 5,
    carbs: 27,
    fats: 3,
    fiber: 4,
};

export const wireFoodLog = {
    id: 'l1',
    food_id: 'f1',
    meal_type: 'breakfast',
    servings: 1.5,
    calories: 225,
    protein: 7.5,
    carbs: 40.5,
    fats: 4.5,
    notes: null,
    logged_at: '2024-01-02T08:15:00.000000',
};

export const wireGoals = {
    id: 'g1',
    user_id: 'u1',
    goal_type: 'lose_weight',
    target_weight: 70,
    weekly_weight_change: -0.5,
    activity_level: 'moderately_active',
    daily_calories: 2000,
    daily_protein: 150,
    daily_carbs: 200,
    daily_fats: 67,
    daily_water: 2500,
    created_at: '2024-01-01T00:00:00.000000',
    updated_at: '2024-01-02T00:00:00.000000',
};

export const wireDailyNutrition = {
    date: '2024-01-02',
    calories: 1500,
    protein: 110,
    carbs: 160,
    fats: 50,
    fiber: 25,
    water: null,
};

export const wireStats = {
    start_weight: 80,
    current_weight: 77.5,
    total_change: -2.5,
    weekly_average_change: -0.5,
    entry_count: 6,
    streak_days: 3,
};

/**
 * fetch stub answering by "METHOD pathname"; unknown routes get a 404.
 */
export function createRouteFetch(routes: Record<string, { status?: number; body: unknown }>) {
    return vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
        const url = new URL(String(input));
        const route = routes[`${init?.method ?? 'GET'} ${url.pathname}`];
        if (!route) {
            return new Response(JSON.stringify({ detail: 'Not found' }), { status: 404 });
        }
        return new Response(JSON.stringify(route.body), { status: route.status ?? 200 });
    });
}

export function createTestApi(fetchFn: typeof fetch) {
    return createMacroLensApi({
        config: TEST_CONFIG,
        getAuthToken: async () => 'test-token',
        logger: silentLogger,
        fetch: fetchFn,
    });
}
