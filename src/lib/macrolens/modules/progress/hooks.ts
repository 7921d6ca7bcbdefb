/**
 * Progress Module - React Hooks
 *
 * @module macrolens/modules/progress/hooks
 */

import { useState, useEffect, useCallback, useRef } from 'react';
import { idleState, loadingState, toRequestState, type RequestState } from '../../../api-client';
import { useMacroLensApi } from '../../context';
import type { ProgressStats } from '../../types';

export interface UseProgressStatsReturn {
    state: RequestState<ProgressStats>;
    refresh: () => Promise<void>;
}

/**
 * Aggregate progress statistics. A user with no entries yet gets 'empty'.
 */
export function useProgressStats(): UseProgressStatsReturn {
    const api = useMacroLensApi();
    const [state, setState] = useState<RequestState<ProgressStats>>(idleState);
    const mountedRef = useRef(true);

    const refresh = useCallback(async () => {
        setState(loadingState);

        const result = await api.progress.stats();

        if (!mountedRef.current) return;

        setState(toRequestState(result, stats => stats.entryCount === 0));
    }, [api]);

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
