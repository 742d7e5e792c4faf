/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { none, some } from '../../src/models/Option';
import { ReviewRecorder } from '../../src/reviews/ReviewRecorder';
import { applyRelease } from '../../src/reviews/StatisticsAggregator';

describe('StatisticsAggregator', () => {
    it('should create statistics on first release', () => {
        expect(applyRelease(none, 'store-a', 100, 5, 10)).toEqual({
            id: 'stats:store-a',
            docType: 'storeStatistics',
            store: 'store-a',
            totalTransactions: 1,
            totalRevenue: 100,
            averageRating: 5,
            updatedAt: 10
        });
    });

    it('should keep a running mean of ratings', () => {
        const first = applyRelease(none, 'store-a', 100, 5, 10);
        const second = applyRelease(some(first), 'store-a', 50, 3, 20);
        const third = applyRelease(some(second), 'store-a', 0, 1, 30);

        expect(second.averageRating).toBe(4);
        expect(third).toMatchObject({ totalTransactions: 3, totalRevenue: 150, averageRating: 3, updatedAt: 30 });
    });
});

describe('ReviewRecorder', () => {
    const draft = { customer: 'customer', store: 'store-a', review: 'solid', rating: 4 };

    it('should key reviews by transaction and episode', () => {
        const review = new ReviewRecorder('store').record(draft, 'tx-9', 3, 50);
        expect(review).toEqual({
            id: 'review:tx-9:3',
            docType: 'review',
            transactionId: 'tx-9',
            episode: 3,
            customer: 'customer',
            store: 'store-a',
            review: 'solid',
            rating: 4,
            visibleTo: 'store-a',
            createdAt: 50
        });
    });

    it('should grant visibility according to the policy', () => {
        const recorder = new ReviewRecorder('customer');
        const review = recorder.record(draft, 'tx-9', 1, 50);

        expect(review.visibleTo).toBe('customer');
        expect(recorder.canRead(review, 'customer')).toBe(true);
        expect(recorder.canRead(review, 'store-a')).toBe(false);
    });
});
