/**
 * MacroLens API
 *
 * One explicit instance wiring the client and every feature module. Create
 * it once at app start and hand it to components through
 * MacroLensApiProvider.
 *
 * @module macrolens/api
 */

import { createMacroLensClient, type MacroLensClientOptions } from './client';
import { loadAppConfig, type AppConfig } from './config';
import { createFoodApi } from './modules/food/api';
import { createFoodLogsApi } from './modules/food-logs/api';
import { createNutritionApi } from './modules/nutrition/api';
import { createProgressApi } from './modules/progress/api';

export type MacroLensApiOptions = Omit<MacroLensClientOptions, 'config'> & {
    /** Default: loadAppConfig() from process.env */
    config?: AppConfig;
};

/**
 * @example
 * const api = createMacroLensApi({ getAuthToken: async () => tokens.access });
 *
 * const today = await api.foodLogs.today();
 */
export function createMacroLensApi(options: MacroLensApiOptions = {}) {
    const client = createMacroLensClient({ ...options, config: options.config ?? loadAppConfig() });

    return {
        client,
        food: createFoodApi(client),
        foodLogs: createFoodLogsApi(client),
        nutrition: createNutritionApi(client),
        progress: createProgressApi(client),
    };
}

export type MacroLensApi = ReturnType<typeof createMacroLensApi>;
