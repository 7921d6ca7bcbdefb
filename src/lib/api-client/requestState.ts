/**
 * Request State - UI-agnostic request lifecycle
 *
 * States:
 * - idle: no request made yet
 * - loading: request in progress
 * - success: request completed with data
 * - error: request failed with an ApiError
 * - empty: request completed but the data counts as empty
 *
 * @module api-client/requestState
 */

import type { ApiError, Result } from './types';

// =============================================================================
// REQUEST STATE TYPE
// =============================================================================

/**
 * @example
 * function describe(state: RequestState<FoodLog[]>): string {
 *   switch (state.status) {
 *     case 'loading': return 'Loading your meals…';
 *     case 'success': return `${state.data.length} meals logged`;
 *     case 'error': return state.error.message;
 *     case 'empty': return 'Nothing logged yet today';
 *     case 'idle': return '';
 *   }
 * }
 */
export type RequestState<T> =
    | { status: 'idle' }
    | { status: 'loading' }
    | { status: 'success'; data: T }
    | { status: 'error'; error: ApiError }
    | { status: 'empty' };

// States without data fit any RequestState<T>
export const idleState: RequestState<never> = { status: 'idle' };
export const loadingState: RequestState<never> = { status: 'loading' };
export const emptyState: RequestState<never> = { status: 'empty' };

// =============================================================================
// CONVERSIONS
// =============================================================================

/**
 * Settled state for a finished call. `isEmpty` turns successful but empty
 * data (no logs today, no search matches) into `empty`.
 *
 * @example
 * setState(toRequestState(await api.foodLogs.today(), logs => logs.length === 0));
 */
export function toRequestState<T>(result: Result<T>, isEmpty?: (data: T) => boolean): RequestState<T> {
    if (!result.ok) return { status: 'error', error: result.error };
    return isEmpty?.(result.data) ? emptyState : { status: 'success', data: result.data };
}

/**
 * Transforms the data of a success state; every other state passes through.
 */
export function mapRequestState<T, U>(state: RequestState<T>, transform: (data: T) => U): RequestState<U> {
    return state.status === 'success'
        ? { status: 'success', data: transform(state.data) }
        : state;
}

// =============================================================================
// RENDER HELPER
// =============================================================================

/**
 * The generic R is the return type (React element, string, etc.).
 */
export interface RequestStateHandlers<T, R> {
    /** idle and loading, and empty when there is no empty handler */
    pending: () => R;
    success: (data: T) => R;
    error: (error: ApiError) => R;
    empty?: () => R;
}

/**
 * @example
 * return renderRequestState(todayState, {
 *   pending: () => <Spinner />,
 *   success: logs => <MealList logs={logs} />,
 *   error: err => <ErrorBanner message={err.message} />,
 *   empty: () => <EmptyDiary />,
 * });
 */
export function renderRequestState<T, R>(state: RequestState<T>, handlers: RequestStateHandlers<T, R>): R {
    if (state.status === 'success') return handlers.success(state.data);
    if (state.status === 'error') return handlers.error(state.error);
    if (state.status === 'empty' && handlers.empty) return handlers.empty();
    return handlers.pending();
}

// =============================================================================
// MULTIPLE REQUEST STATES
// =============================================================================

/**
 * Combine two request states into one.
 *
 * - any loading → loading
 * - any error → the first error
 * - all success → success with the tuple of data
 * - all idle → idle
 * - any empty → empty
 * - otherwise → loading
 */
export function combineRequestStates<A, B>(
    first: RequestState<A>,
    second: RequestState<B>
): RequestState<[A, B]> {
    const states = [first, second];

    if (states.some(s => s.status === 'loading')) return loadingState;

    if (first.status === 'error') return first;
    if (second.status === 'error') return second;

    if (first.status === 'success' && second.status === 'success') {
        return { status: 'success', data: [first.data, second.data] };
    }

    if (states.every(s => s.status === 'idle')) return idleState;
    if (states.some(s => s.status === 'empty')) return emptyState;

    return loadingState;
}
