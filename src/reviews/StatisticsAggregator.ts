/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Option } from '../models/Option';
import type { StoreStatistics } from '../models/StoreStatistics';

export function statisticsKey(store: string): string {
    return `stats:${store}`;
}

/**
 * Folds one released payment into a store's running totals. The first release
 * for a store creates its record.
 */
export function applyRelease(
    existing: Option<StoreStatistics>,
    store: string,
    revenue: number,
    rating: number,
    now: number
): StoreStatistics {
    if (existing.kind === 'none') {
        return {
            id: statisticsKey(store),
            docType: 'storeStatistics',
            store,
            totalTransactions: 1,
            totalRevenue: revenue,
            averageRating: rating,
            updatedAt: now
        };
    }

    const stats = existing.value;
    const n = stats.totalTransactions + 1;

    return {
        ...stats,
        totalTransactions: n,
        totalRevenue: stats.totalRevenue + revenue,
        averageRating: (stats.averageRating * (n - 1) + rating) / n,
        updatedAt: now
    };
}
