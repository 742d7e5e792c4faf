/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError } from '../../errors';
import type { ItemReview } from '../../models/ItemReview';
import { reviewKey } from '../../reviews/ReviewRecorder';
import { ItemReviewSchema } from '../schemas';
import { readRecord, writeRecord, type WorldState } from '../state';

export class ReviewsRepository {
    constructor(private state: WorldState) {}

    async find(transactionId: string, episode: number): Promise<ItemReview | undefined> {
        return readRecord(this.state, reviewKey(transactionId, episode), ItemReviewSchema);
    }

    async create(review: ItemReview): Promise<void> {
        if (await this.find(review.transactionId, review.episode)) {
            throw new EscrowError('InvalidTransaction', `Review ${review.id} already exists`);
        }
        await writeRecord(this.state, review.id, review);
    }
}
