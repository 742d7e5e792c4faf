/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { TransactionStatus } from '../models/EscrowTransaction';

// Records are re-validated on every read so a malformed state entry never reaches the engine.

const amount = z.number().int().nonnegative().safe();

function optionOf<T extends z.ZodTypeAny>(value: T) {
    return z.discriminatedUnion('kind', [
        z.object({ kind: z.literal('some'), value }),
        z.object({ kind: z.literal('none') })
    ]);
}

export const EscrowTransactionSchema = z.object({
    id: z.string(),
    docType: z.literal('transaction'),
    customer: z.string(),
    store: optionOf(z.string()),
    item: z.string(),
    quantity: amount,
    price: amount,
    escrow: amount,
    totalDeposited: amount,
    totalWithdrawn: amount,
    dispute: z.boolean(),
    fulfilled: z.boolean(),
    rating: optionOf(z.number().int()),
    status: z.nativeEnum(TransactionStatus),
    episode: z.number().int().positive(),
    closed: z.boolean(),
    createdAt: z.number().int(),
    deadline: z.number().int(),
    updatedAt: z.number().int()
});

export const AccountSchema = z.object({
    id: z.string(),
    docType: z.literal('account'),
    owner: z.string(),
    balance: amount,
    createdAt: z.number().int(),
    updatedAt: z.number().int()
});

export const ItemReviewSchema = z.object({
    id: z.string(),
    docType: z.literal('review'),
    transactionId: z.string(),
    episode: z.number().int().positive(),
    customer: z.string(),
    store: z.string(),
    review: z.string(),
    rating: z.number().int(),
    visibleTo: z.string(),
    createdAt: z.number().int()
});

export const StoreStatisticsSchema = z.object({
    id: z.string(),
    docType: z.literal('storeStatistics'),
    store: z.string(),
    totalTransactions: z.number().int().positive(),
    totalRevenue: z.number().int().nonnegative(),  // A running statistic, not held value
    averageRating: z.number(),
    updatedAt: z.number().int()
});
