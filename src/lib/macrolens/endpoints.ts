/**
 * MacroLens Endpoint Registry
 *
 * Every API route, grouped by resource family. Each entry carries its HTTP
 * method and path template; `{name}` placeholders become typed path params
 * on the matching `Endpoint` variant, so a route that addresses a record
 * cannot be built without its identifier.
 *
 * Paths are relative to the versioned base URL (see config.ts).
 *
 * @module macrolens/endpoints
 */

import type { EndpointDefinition, HttpMethod, RequestSpec } from '../api-client';

// =============================================================================
// ENDPOINT REGISTRY
// =============================================================================

export const API_ENDPOINTS = {
    // ===========================================================================
    // AUTH
    // ===========================================================================
    auth: {
        register: { method: 'POST', path: '/auth/register', description: 'Create an account' },
        login: { method: 'POST', path: '/auth/login', description: 'Exchange credentials for tokens' },
        refreshToken: { method: 'POST', path: '/auth/refresh', description: 'Rotate the access token' },
        logout: { method: 'POST', path: '/auth/logout', description: 'Revoke the current session' },
        verifyEmail: { method: 'POST', path: '/auth/verify-email', description: 'Confirm an email address' },
        resetPassword: { method: 'POST', path: '/auth/reset-password', description: 'Start a password reset' },
        me: { method: 'GET', path: '/auth/me', description: 'Get the signed-in user' },
    },

    // ===========================================================================
    // USERS
    // ===========================================================================
    users: {
        profile: { method: 'GET', path: '/users/profile', description: 'Get the user profile' },
        updateProfile: { method: 'PUT', path: '/users/profile', description: 'Update the user profile' },
        deleteAccount: { method: 'DELETE', path: '/users/account', description: 'Delete the account and its data' },
        preferences: { method: 'GET', path: '/users/preferences', description: 'Get app preferences' },
        updatePreferences: { method: 'PUT', path: '/users/preferences', description: 'Update app preferences' },
    },

    // ===========================================================================
    // FOOD
    // ===========================================================================
    food: {
        search: { method: 'GET', path: '/food/search', description: 'Search the food database' },
        details: { method: 'GET', path: '/food/{id}', description: 'Get one food with its nutrients' },
        scan: { method: 'POST', path: '/food/scan', description: 'Identify food from a photo or barcode' },
        custom: { method: 'POST', path: '/food/custom', description: 'Create a user-defined food' },
        popular: { method: 'GET', path: '/food/popular', description: 'Most logged foods' },
    },

    // ===========================================================================
    // FOOD LOGS
    // ===========================================================================
    foodLogs: {
        list: { method: 'GET', path: '/food/logs', description: 'List food log entries' },
        create: { method: 'POST', path: '/food/log', description: 'Log a food' },
        details: { method: 'GET', path: '/food/logs/{id}', description: 'Get one log entry' },
        update: { method: 'PUT', path: '/food/logs/{id}', description: 'Edit a log entry' },
        delete: { method: 'DELETE', path: '/food/logs/{id}', description: 'Remove a log entry' },
        today: { method: 'GET', path: '/food/logs/today', description: "Today's log entries" },
        byDate: { method: 'GET', path: '/food/logs/date/{date}', description: 'Log entries for a YYYY-MM-DD date' },
        dailySummary: { method: 'GET', path: '/food/logs/daily-summary', description: 'Totals against goals for a day' },
    },

    // ===========================================================================
    // NUTRITION
    // ===========================================================================
    nutrition: {
        goals: { method: 'GET', path: '/nutrition/goals', description: 'Get nutrition goals' },
        updateGoals: { method: 'PUT', path: '/nutrition/goals', description: 'Update nutrition goals' },
        daily: { method: 'GET', path: '/nutrition/daily', description: 'Nutrient totals for a day' },
        macroBreakdown: { method: 'GET', path: '/nutrition/macros', description: 'Macro split for a day' },
    },

    // ===========================================================================
    // RECIPES
    // ===========================================================================
    recipes: {
        list: { method: 'GET', path: '/recipes', description: 'List recipes' },
        search: { method: 'GET', path: '/recipes/search', description: 'Search recipes' },
        details: { method: 'GET', path: '/recipes/{id}', description: 'Get one recipe' },
        create: { method: 'POST', path: '/recipes', description: 'Create a recipe' },
        update: { method: 'PUT', path: '/recipes/{id}', description: 'Edit a recipe' },
        delete: { method: 'DELETE', path: '/recipes/{id}', description: 'Delete a recipe' },
        favorites: { method: 'GET', path: '/recipes/favorites', description: 'Favourite recipes' },
        toggleFavorite: { method: 'POST', path: '/recipes/{id}/favorite', description: 'Toggle a favourite' },
    },

    // ===========================================================================
    // MEAL PLANS
    // ===========================================================================
    mealPlans: {
        list: { method: 'GET', path: '/meal-plans', description: 'List meal plans' },
        generate: { method: 'POST', path: '/meal-plans/generate', description: 'Generate a meal plan' },
        details: { method: 'GET', path: '/meal-plans/{id}', description: 'Get one meal plan' },
        update: { method: 'PUT', path: '/meal-plans/{id}', description: 'Edit a meal plan' },
        delete: { method: 'DELETE', path: '/meal-plans/{id}', description: 'Delete a meal plan' },
        active: { method: 'GET', path: '/meal-plans/active', description: 'The active meal plan' },
    },

    // ===========================================================================
    // PROGRESS
    // ===========================================================================
    progress: {
        list: { method: 'GET', path: '/progress', description: 'List progress entries' },
        create: { method: 'POST', path: '/progress', description: 'Record a progress entry' },
        history: { method: 'GET', path: '/progress/history', description: 'Progress over a date range' },
        stats: { method: 'GET', path: '/progress/stats', description: 'Aggregate progress statistics' },
    },

    // ===========================================================================
    // HEALTH
    // ===========================================================================
    health: {
        sync: { method: 'POST', path: '/health/sync', description: 'Upload health-app samples' },
        data: { method: 'GET', path: '/health/data', description: 'Synced health data' },
    },
} as const satisfies Record<string, Record<string, EndpointDefinition>>;

// =============================================================================
// ENDPOINT TYPES
// =============================================================================

type Registry = typeof API_ENDPOINTS;

export type ResourceFamily = keyof Registry;

export type EndpointOperation<F extends ResourceFamily> = keyof Registry[F] & string;

type PathTemplate<F extends ResourceFamily, O extends EndpointOperation<F>> =
    Registry[F][O] extends { path: infer P extends string } ? P : never;

/**
 * Placeholder names of a path template.
 * @example PathParamNames<'/recipes/{id}/favorite'> // 'id'
 */
export type PathParamNames<P extends string> =
    P extends `${string}{${infer Name}}${infer Rest}` ? Name | PathParamNames<Rest> : never;

type EndpointVariant<F extends ResourceFamily, O extends EndpointOperation<F>> =
    [PathParamNames<PathTemplate<F, O>>] extends [never]
        ? { family: F; operation: O }
        : { family: F; operation: O; params: Record<PathParamNames<PathTemplate<F, O>>, string> };

/**
 * Every route of the API as a closed union.
 *
 * @example
 * const endpoint: Endpoint = { family: 'foodLogs', operation: 'details', params: { id: '42' } };
 */
export type Endpoint = {
    [F in ResourceFamily]: {
        [O in EndpointOperation<F>]: EndpointVariant<F, O>;
    }[EndpointOperation<F>];
}[ResourceFamily];

export interface ResolvedEndpoint {
    path: string;
    method: HttpMethod;
}

// =============================================================================
// RESOLUTION
// =============================================================================

const REGISTRY: Readonly<Record<string, Readonly<Record<string, EndpointDefinition>>>> = API_ENDPOINTS;

/**
 * Substitutes path params into a template verbatim: no encoding, no
 * validation of the value.
 */
export function interpolatePath(template: string, params: Readonly<Record<string, string>>): string {
    return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => params[name] ?? placeholder);
}

/**
 * Resolves an endpoint to its concrete path and method.
 *
 * @example
 * resolveEndpoint({ family: 'foodLogs', operation: 'details', params: { id: '42' } });
 * // { path: '/food/logs/42', method: 'GET' }
 */
export function resolveEndpoint(endpoint: Endpoint): ResolvedEndpoint {
    const definition = REGISTRY[endpoint.family][endpoint.operation];
    const path = 'params' in endpoint
        ? interpolatePath(definition.path, endpoint.params)
        : definition.path;

    return { path, method: definition.method };
}

/**
 * RequestSpec for an endpoint, with builder options layered on top.
 *
 * @example
 * buildRequest(requestFor({ family: 'food', operation: 'popular' }, { requiresAuth: false }), context);
 */
export function requestFor(
    endpoint: Endpoint,
    options: Omit<RequestSpec, 'path' | 'method'> = {}
): RequestSpec {
    return { ...options, ...resolveEndpoint(endpoint) };
}

/**
 * Absolute URL of an endpoint under the given base URL.
 */
export function fullUrl(endpoint: Endpoint, baseUrl: string): string {
    return `${baseUrl.replace(/\/$/, '')}${resolveEndpoint(endpoint).path}`;
}

// =============================================================================
// UTILITY FUNCTIONS
// =============================================================================

/**
 * Registry entries with their family and operation names.
 */
export function listEndpoints(family?: ResourceFamily): Array<EndpointDefinition & { family: string; operation: string }> {
    return Object.entries(REGISTRY)
        .filter(([name]) => family === undefined || name === family)
        .flatMap(([name, operations]) =>
            Object.entries(operations).map(([operation, definition]) => ({
                family: name,
                operation,
                ...definition,
            }))
        );
}

/**
 * Family names in registry order.
 */
export function getResourceFamilies(): ResourceFamily[] {
    return Object.keys(API_ENDPOINTS).filter(isResourceFamily);
}

function isResourceFamily(name: string): name is ResourceFamily {
    return name in API_ENDPOINTS;
}
