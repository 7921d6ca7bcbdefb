/**
 * MacroLens API Context
 *
 * Hands one MacroLensApi instance to the module hooks.
 *
 * @module macrolens/context
 */

import React, { createContext, useContext } from 'react';
import type { MacroLensApi } from './api';

const MacroLensApiContext = createContext<MacroLensApi | undefined>(undefined);

export interface MacroLensApiProviderProps {
    api: MacroLensApi;
    children: React.ReactNode;
}

/**
 * @example
 * const api = createMacroLensApi({ getAuthToken });
 *
 * <MacroLensApiProvider api={api}>
 *   <DiaryScreen />
 * </MacroLensApiProvider>
 */
export function MacroLensApiProvider({ api, children }: MacroLensApiProviderProps) {
    return <MacroLensApiContext.Provider value={api}>{children}</MacroLensApiContext.Provider>;
}

export function useMacroLensApi(): MacroLensApi {
    const api = useContext(MacroLensApiContext);
    if (api === undefined) {
        throw new Error('useMacroLensApi must be used within a MacroLensApiProvider');
    }
    return api;
}
