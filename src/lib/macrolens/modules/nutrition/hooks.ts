/**
 * Nutrition Module - React Hooks
 *
 * @module macrolens/modules/nutrition/hooks
 */

import { useState, useEffect, useCallback, useRef } from 'react';
import {
    combineRequestStates,
    idleState,
    loadingState,
    mapRequestState,
    toRequestState,
    type RequestState,
} from '../../../api-client';
import { useMacroLensApi } from '../../context';
import type { DailyNutrition, NutritionGoals } from '../../types';

// =============================================================================
// useDailyNutrition - Goals and a day's totals together
// =============================================================================

export interface DailyNutritionView {
    goals: NutritionGoals;
    totals: DailyNutrition;
}

export interface UseDailyNutritionReturn {
    state: RequestState<DailyNutritionView>;
    refresh: () => Promise<void>;
}

/**
 * Loads goals and daily totals in parallel. Either failing puts the hook in
 * the error state with the first error.
 *
 * @param date - YYYY-MM-DD; today when omitted
 */
export function useDailyNutrition(date?: string): UseDailyNutritionReturn {
    const api = useMacroLensApi();
    const [state, setState] = useState<RequestState<DailyNutritionView>>(idleState);
    const mountedRef = useRef(true);

    const refresh = useCallback(async () => {
        setState(loadingState);

        const [goals, totals] = await Promise.all([
            api.nutrition.goals(),
            api.nutrition.daily(date),
        ]);

        if (!mountedRef.current) return;

        const combined = combineRequestStates(toRequestState(goals), toRequestState(totals));
        setState(mapRequestState(combined, ([goalsData, totalsData]) => ({ goals: goalsData, totals: totalsData })));
    }, [api, date]);

    useEffect(() => {
        void refresh();
    }, [refresh]);

    // Cleanup
    useEffect(() => {
        mountedRef.current = true;
        return () => { mountedRef.current = false; };
    }, []);

    return { state, refresh };
}
