/**
 * Food Logs Module - React Hooks
 *
 * Uses RequestState for loading/error/empty handling.
 *
 * @module macrolens/modules/food-logs/hooks
 */

import { useState, useEffect, useCallback, useRef } from 'react';
import { idleState, loadingState, toRequestState, type RequestState, type Result } from '../../../api-client';
import { useMacroLensApi } from '../../context';
import type { FoodLog, FoodLogInput } from '../../types';

// =============================================================================
// useTodayLogs - Today's diary
// =============================================================================

export interface UseTodayLogsReturn {
    state: RequestState<FoodLog[]>;
    refresh: () => Promise<void>;
}

/**
 * Fetches today's entries on mount. No entries gives the 'empty' state.
 *
 * @param autoRefreshInterval - Auto-refresh interval in ms (0 to disable)
 */
export function useTodayLogs(autoRefreshInterval: number = 0): UseTodayLogsReturn {
    const api = useMacroLensApi();
    const [state, setState] = useState<RequestState<FoodLog[]>>(idleState);
    const mountedRef = useRef(true);

    const refresh = useCallback(async () => {
        setState(loadingState);

        const result = await api.foodLogs.today();

        if (!mountedRef.current) return;

        setState(toRequestState(result, logs => logs.length === 0));
    }, [api]);

    // Initial fetch
    useEffect(() => {
        void refresh();
    }, [refresh]);

    // Auto-refresh
    useEffect(() => {
        if (autoRefreshInterval <= 0) return;
        const interval = setInterval(() => void refresh(), autoRefreshInterval);
        return () => clearInterval(interval);
    }, [refresh, autoRefreshInterval]);

    // Cleanup
    useEffect(() => {
        mountedRef.current = true;
        return () => { mountedRef.current = false; };
    }, []);

    return { state, refresh };
}

// =============================================================================
// useLogFood - Add an entry
// =============================================================================

export interface UseLogFoodOptions {
    /** Called with the created entry */
    onLogged?: (log: FoodLog) => void;
}

export interface UseLogFoodReturn {
    state: RequestState<FoodLog>;
    logFood: (input: FoodLogInput) => Promise<Result<FoodLog>>;
    reset: () => void;
}

/**
 * Mutation hook: idle until `logFood` is called.
 *
 * @example
 * const { logFood, state } = useLogFood({ onLogged: () => today.refresh() });
 * await logFood({ foodId: food.id, mealType: 'dinner', servings: 1 });
 */
export function useLogFood(options: UseLogFoodOptions = {}): UseLogFoodReturn {
    const { onLogged } = options;
    const api = useMacroLensApi();
    const [state, setState] = useState<RequestState<FoodLog>>(idleState);
    const mountedRef = useRef(true);

    const logFood = useCallback(async (input: FoodLogInput) => {
        setState(loadingState);

        const result = await api.foodLogs.create(input);

        if (mountedRef.current) {
            setState(toRequestState(result));
        }
        if (result.ok) {
            onLogged?.(result.data);
        }

        return result;
    }, [api, onLogged]);

    const reset = useCallback(() => setState(idleState), []);

    // Cleanup
    useEffect(() => {
        mountedRef.current = true;
        return () => { mountedRef.current = false; };
    }, []);

    return { state, logFood, reset };
}
