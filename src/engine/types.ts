/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EscrowTransaction } from '../models/EscrowTransaction';
import type { Option } from '../models/Option';

/** Who is calling and when, as reported by the peer for this invocation. */
export interface Invocation {
    caller: string;
    role: Option<string>;   // "role" attribute of the caller's certificate
    txId: string;
    now: number;            // Proposal timestamp, epoch milliseconds
}

export enum TransactionAction {
    CREATED = 'TransactionCreated',
    ACCEPTED = 'TransactionAccepted',
    FULFILLED = 'TransactionFulfilled',
    MARKED_COMPLETE = 'TransactionMarkedComplete',
    DISPUTED = 'TransactionDisputed',
    DISPUTE_RESOLVED = 'DisputeResolved',
    PAYMENT_RELEASED = 'PaymentReleased',
    FUNDS_ADDED = 'FundsAdded',
    CANCELLED = 'TransactionCancelled',
    REFUNDED = 'TransactionRefunded',
    PARTIALLY_REFUNDED = 'TransactionPartiallyRefunded',
    STORE_RATED = 'StoreRated',
    DETAILS_UPDATED = 'TransactionDetailsUpdated',
    DEADLINE_EXTENDED = 'DeadlineExtended'
}

export interface Payout {
    to: string;
    amount: number;
}

export interface Deposit {
    from: string;
    amount: number;
}

export interface ReviewDraft {
    customer: string;
    store: string;
    review: string;
    rating: number;
}

/**
 * Outcome of one operation against one transaction snapshot. Nothing has been
 * written yet; the service applies it as a unit.
 */
export interface Decision {
    action: TransactionAction;
    transaction: EscrowTransaction;
    deposit: Option<Deposit>;
    payouts: Payout[];
    review: Option<ReviewDraft>;
}

export interface CreateTransactionInput {
    item: string;
    quantity: number;
    price: number;
    duration: number;       // Milliseconds from creation to deadline
}

export interface TransactionEvent {
    transactionId: string;
    action: TransactionAction;
    episode: number;
    timestamp: number;
}
