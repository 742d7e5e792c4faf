/*
 * SPDX-License-Identifier: Apache-2.0
 */

export type ReviewVisibility = 'store' | 'customer';

export interface ItemReview {
    id: string;             // "review:<transactionId>:<episode>"
    docType: 'review';
    transactionId: string;
    episode: number;
    customer: string;
    store: string;
    review: string;
    rating: number;
    visibleTo: string;      // Principal allowed to read the review
    createdAt: number;
}
