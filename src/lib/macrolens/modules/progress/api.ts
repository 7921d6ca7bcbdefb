/**
 * Progress Module - API Functions
 *
 * Weigh-ins and body measurements over time.
 *
 * @module macrolens/modules/progress/api
 */

import type { Result } from '../../../api-client';
import type { MacroLensClient } from '../../client';
import {
    progressEntryListSchema,
    progressEntrySchema,
    progressStatsSchema,
    type ProgressEntry,
    type ProgressEntryInput,
    type ProgressHistoryQuery,
    type ProgressStats,
} from '../../types';

export function createProgressApi(client: MacroLensClient) {
    return {
        list(): Promise<Result<ProgressEntry[]>> {
            return client.sendWrapped({ family: 'progress', operation: 'list' }, progressEntryListSchema);
        },

        /**
         * @example
         * await progress.create({ weight: 72.4, recordedAt: new Date() });
         */
        create(input: ProgressEntryInput): Promise<Result<ProgressEntry>> {
            return client.sendWrapped({ family: 'progress', operation: 'create' }, progressEntrySchema, {
                body: input,
            });
        },

        history(query: ProgressHistoryQuery = {}): Promise<Result<ProgressEntry[]>> {
            return client.sendWrapped({ family: 'progress', operation: 'history' }, progressEntryListSchema, {
                query: { from: query.from, to: query.to },
            });
        },

        stats(): Promise<Result<ProgressStats>> {
            return client.sendWrapped({ family: 'progress', operation: 'stats' }, progressStatsSchema);
        },
    };
}

export type ProgressApi = ReturnType<typeof createProgressApi>;
