/*
 * SPDX-License-Identifier: Apache-2.0
 */

export interface StoreStatistics {
    id: string;             // "stats:<store>"
    docType: 'storeStatistics';
    store: string;
    totalTransactions: number;
    totalRevenue: number;
    averageRating: number;
    updatedAt: number;
}
