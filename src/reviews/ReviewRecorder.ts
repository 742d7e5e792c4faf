/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ReviewDraft } from '../engine/types';
import type { ItemReview, ReviewVisibility } from '../models/ItemReview';

export function reviewKey(transactionId: string, episode: number): string {
    return `review:${transactionId}:${episode}`;
}

export class ReviewRecorder {
    constructor(private readonly visibility: ReviewVisibility) {}

    // One review per transaction episode; the record is never rewritten.
    record(draft: ReviewDraft, transactionId: string, episode: number, now: number): ItemReview {
        return {
            id: reviewKey(transactionId, episode),
            docType: 'review',
            transactionId,
            episode,
            customer: draft.customer,
            store: draft.store,
            review: draft.review,
            rating: draft.rating,
            visibleTo: this.visibility === 'store' ? draft.store : draft.customer,
            createdAt: now
        };
    }

    canRead(review: ItemReview, principal: string): boolean {
        return review.visibleTo === principal;
    }
}
