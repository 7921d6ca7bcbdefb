/**
 * MacroLens - Public Exports
 *
 * @module macrolens
 */

// Instance and React context
export { createMacroLensApi, type MacroLensApi, type MacroLensApiOptions } from './api';
export { MacroLensApiProvider, useMacroLensApi, type MacroLensApiProviderProps } from './context';

// Client and configuration
export { createMacroLensClient, type MacroLensClient, type MacroLensClientOptions, type EndpointCallOptions } from './client';
export {
    loadAppConfig,
    apiBaseUrl,
    ConfigError,
    API_ORIGINS,
    API_VERSION,
    APP_ENVIRONMENTS,
    PLATFORM,
    REQUEST_TIMEOUT_MS,
    type AppConfig,
    type AppEnvironment,
} from './config';

// Endpoint registry
export {
    API_ENDPOINTS,
    resolveEndpoint,
    requestFor,
    fullUrl,
    interpolatePath,
    listEndpoints,
    getResourceFamilies,
    type Endpoint,
    type EndpointOperation,
    type PathParamNames,
    type ResolvedEndpoint,
    type ResourceFamily,
} from './endpoints';

// Domain types
export * from './types';

// Feature modules
export * from './modules/food';
export * from './modules/food-logs';
export * from './modules/nutrition';
export * from './modules/progress';
