/**
 * Food Module - React Hooks
 *
 * @module macrolens/modules/food/hooks
 */

import { useState, useEffect, useCallback, useRef } from 'react';
import { idleState, loadingState, toRequestState, type RequestState } from '../../../api-client';
import { useMacroLensApi } from '../../context';
import type { FoodSearchResult } from '../../types';
import { DEFAULT_SEARCH_LIMIT } from './api';

// =============================================================================
// useFoodSearch - Search as the user types
// =============================================================================

export interface UseFoodSearchOptions {
    /** Maximum results per search (default: 20) */
    limit?: number;
    /** Queries shorter than this stay idle (default: 2) */
    minLength?: number;
}

export interface UseFoodSearchReturn {
    state: RequestState<FoodSearchResult>;
    refresh: () => Promise<void>;
}

/**
 * Searches whenever the trimmed query changes. A response that arrives after
 * a newer search has started is dropped.
 *
 * @example
 * const { state } = useFoodSearch(searchText);
 * if (state.status === 'empty') return <NoMatches />;
 */
export function useFoodSearch(query: string, options: UseFoodSearchOptions = {}): UseFoodSearchReturn {
    const { limit = DEFAULT_SEARCH_LIMIT, minLength = 2 } = options;
    const api = useMacroLensApi();
    const [state, setState] = useState<RequestState<FoodSearchResult>>(idleState);
    const mountedRef = useRef(true);
    const latestRef = useRef(0);

    const trimmed = query.trim();

    const refresh = useCallback(async () => {
        const requestId = ++latestRef.current;

        if (trimmed.length < minLength) {
            setState(idleState);
            return;
        }

        setState(loadingState);

        const result = await api.food.search(trimmed, limit);

        if (!mountedRef.current || requestId !== latestRef.current) return;

        setState(toRequestState(result, data => data.results.length === 0));
    }, [api, trimmed, limit, minLength]);

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
