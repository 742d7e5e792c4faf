/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError } from '../errors';
import { Custody } from '../escrow/custody';
import { TransactionStatus, type EscrowTransaction } from '../models/EscrowTransaction';
import { isSome, none, some, type Option } from '../models/Option';
import { authorize, Role } from '../policy/authorization';
import { requireWindowElapsed, requireWithinWindow } from '../policy/deadline';
import type { Config } from '../types/config';
import {
    TransactionAction,
    type CreateTransactionInput,
    type Decision,
    type Deposit,
    type Invocation,
    type Payout,
    type ReviewDraft
} from './types';

export type EngineConfig = Pick<Config, 'ratingMin' | 'ratingMax' | 'disputeResolution'>;

interface Withdrawal {
    amount: number;
    escrow: number;
    totalWithdrawn: number;
}

/**
 * Transaction lifecycle deciders.
 *
 * Every method validates the caller, the deadline and the record state against
 * the snapshot it was given, then returns the next record together with the
 * value movements to apply. A rejected operation throws an EscrowError and
 * produces nothing.
 *
 * Whole-escrow withdrawals (resolve, release, cancel, refund) always reset the
 * episode, so a second withdrawal on the same deposit acts on a zero balance
 * or fails.
 */
export class TransactionEngine {
    constructor(private readonly config: EngineConfig) {}

    create(call: Invocation, input: CreateTransactionInput): Decision {
        requireNonNegative(input.quantity, 'Quantity');
        requireNonNegative(input.price, 'Price');
        requireNonNegative(input.duration, 'Duration');
        const deadline = requireTimestamp(call.now + input.duration);

        const transaction: EscrowTransaction = {
            id: call.txId,
            docType: 'transaction',
            customer: call.caller,
            store: none,
            item: input.item,
            quantity: input.quantity,
            price: input.price,
            escrow: 0,
            totalDeposited: 0,
            totalWithdrawn: 0,
            dispute: false,
            fulfilled: false,
            rating: none,
            status: TransactionStatus.OPEN,
            episode: 1,
            closed: false,
            createdAt: call.now,
            deadline,
            updatedAt: call.now
        };

        return decision(TransactionAction.CREATED, transaction);
    }

    accept(tx: EscrowTransaction, call: Invocation): Decision {
        if (isSome(tx.store)) {
            throw new EscrowError('InvalidTransaction', `Transaction ${tx.id} has already been accepted`);
        }
        if (tx.customer === call.caller) {
            throw new EscrowError('NotStore', 'A customer cannot accept their own transaction');
        }

        return decision(TransactionAction.ACCEPTED, {
            ...tx,
            store: some(call.caller),
            rating: none,
            status: TransactionStatus.ACCEPTED,
            episode: tx.closed ? tx.episode + 1 : tx.episode,
            closed: false,
            updatedAt: call.now
        });
    }

    fulfill(tx: EscrowTransaction, call: Invocation): Decision {
        return this.completeWork(tx, call, TransactionAction.FULFILLED);
    }

    // Same rule as fulfil, deadline included; only the emitted action differs.
    markComplete(tx: EscrowTransaction, call: Invocation): Decision {
        return this.completeWork(tx, call, TransactionAction.MARKED_COMPLETE);
    }

    dispute(tx: EscrowTransaction, call: Invocation): Decision {
        authorize(call.caller, Role.CustomerOnly, tx, 'Dispute', 'Only the customer can open a dispute');
        requireStore(tx);

        return decision(TransactionAction.DISPUTED, {
            ...tx,
            dispute: true,
            status: TransactionStatus.DISPUTED,
            updatedAt: call.now
        });
    }

    resolveDispute(tx: EscrowTransaction, call: Invocation, resolved: boolean): Decision {
        const role = this.config.disputeResolution === 'customer' ? Role.CustomerOnly : Role.CustomerOrStore;
        authorize(call.caller, role, tx, 'Dispute', 'Caller is not allowed to resolve this dispute');

        if (!tx.dispute) {
            throw new EscrowError('AlreadyResolved', `Transaction ${tx.id} has no open dispute`);
        }
        const store = requireStore(tx);

        // The store can concede a dispute but never award itself the escrow.
        if (call.caller !== tx.customer && resolved) {
            throw new EscrowError('Dispute', 'The store can only resolve a dispute in favour of the customer');
        }

        const withdrawal = withdrawAll(tx);
        const recipient = resolved ? store : tx.customer;

        return decision(
            TransactionAction.DISPUTE_RESOLVED,
            resetEpisode({ ...tx, ...custodyFields(withdrawal) }, TransactionStatus.RESOLVED, call.now),
            { payouts: payout(recipient, withdrawal.amount) }
        );
    }

    releasePayment(tx: EscrowTransaction, call: Invocation, review: string, rating: number): Decision {
        authorize(call.caller, Role.CustomerOnly, tx, 'NotStore', 'Only the customer can release payment');
        this.requireRating(rating);
        requireWindowElapsed(call.now, tx.deadline);

        if (!tx.fulfilled || tx.dispute) {
            throw new EscrowError('InvalidWithdrawal', 'Payment can only be released for a fulfilled transaction without an open dispute');
        }
        const store = requireStore(tx);
        if (tx.escrow <= 0) {
            throw new EscrowError('InsufficientEscrow', `Transaction ${tx.id} holds no escrow`);
        }

        const withdrawal = withdrawAll(tx);
        const next = resetEpisode({ ...tx, ...custodyFields(withdrawal) }, TransactionStatus.COMPLETED, call.now);

        return decision(
            TransactionAction.PAYMENT_RELEASED,
            { ...next, rating: some(rating) },
            {
                payouts: payout(store, withdrawal.amount),
                review: some<ReviewDraft>({ customer: tx.customer, store, review, rating })
            }
        );
    }

    addFunds(tx: EscrowTransaction, call: Invocation, amount: number): Decision {
        authorize(call.caller, Role.CustomerOnly, tx, 'NotStore', 'Only the customer can add funds');
        requirePositive(amount, 'Amount');

        const custody = new Custody(tx.escrow);
        custody.deposit(amount);
        const totalDeposited = tx.totalDeposited + amount;
        if (!Number.isSafeInteger(totalDeposited)) {
            throw new EscrowError('InvalidAmount', `Deposits on ${tx.id} would exceed the largest safe total`);
        }

        return decision(
            TransactionAction.FUNDS_ADDED,
            {
                ...tx,
                escrow: custody.balance,
                totalDeposited,
                updatedAt: call.now
            },
            { deposit: some<Deposit>({ from: call.caller, amount }) }
        );
    }

    cancel(tx: EscrowTransaction, call: Invocation): Decision {
        authorize(call.caller, Role.CustomerOrStore, tx, 'NotStore', 'Only the customer or the assigned store can cancel');
        if (tx.fulfilled || tx.dispute) {
            throw new EscrowError('InvalidWithdrawal', 'A fulfilled or disputed transaction cannot be cancelled');
        }

        return this.refundAll(tx, call, TransactionAction.CANCELLED, TransactionStatus.CANCELLED);
    }

    requestRefund(tx: EscrowTransaction, call: Invocation): Decision {
        authorize(call.caller, Role.CustomerOnly, tx, 'NotStore', 'Only the customer can request a refund');
        if (tx.fulfilled || tx.dispute) {
            throw new EscrowError('InvalidWithdrawal', 'Refunds are not available once fulfilled or disputed');
        }

        return this.refundAll(tx, call, TransactionAction.REFUNDED, TransactionStatus.REFUNDED);
    }

    rateStore(tx: EscrowTransaction, call: Invocation, rating: number): Decision {
        authorize(call.caller, Role.CustomerOnly, tx, 'NotStore', 'Only the customer can rate the store');
        this.requireRating(rating);
        requireStore(tx);
        if (isSome(tx.rating)) {
            throw new EscrowError('InvalidRating', 'The store has already been rated for this transaction');
        }

        return decision(TransactionAction.STORE_RATED, { ...tx, rating: some(rating), updatedAt: call.now });
    }

    updateItem(tx: EscrowTransaction, call: Invocation, item: string): Decision {
        this.requireEditable(tx, call);
        return decision(TransactionAction.DETAILS_UPDATED, { ...tx, item, updatedAt: call.now });
    }

    updatePrice(tx: EscrowTransaction, call: Invocation, price: number): Decision {
        this.requireEditable(tx, call);
        requireNonNegative(price, 'Price');
        return decision(TransactionAction.DETAILS_UPDATED, { ...tx, price, updatedAt: call.now });
    }

    updateQuantity(tx: EscrowTransaction, call: Invocation, quantity: number): Decision {
        this.requireEditable(tx, call);
        requireNonNegative(quantity, 'Quantity');
        return decision(TransactionAction.DETAILS_UPDATED, { ...tx, quantity, updatedAt: call.now });
    }

    updateDeadline(tx: EscrowTransaction, call: Invocation, deadline: number): Decision {
        this.requireEditable(tx, call);
        requireNonNegative(deadline, 'Deadline');
        return decision(TransactionAction.DETAILS_UPDATED, { ...tx, deadline: requireTimestamp(deadline), updatedAt: call.now });
    }

    updateStatus(tx: EscrowTransaction, call: Invocation, status: string): Decision {
        this.requireEditable(tx, call);
        const next = Object.values(TransactionStatus).find((s) => s === status);
        if (!next) {
            throw new EscrowError('InvalidTransaction', `Unknown status ${status}`);
        }
        return decision(TransactionAction.DETAILS_UPDATED, { ...tx, status: next, updatedAt: call.now });
    }

    extendDeadline(tx: EscrowTransaction, call: Invocation, extension: number): Decision {
        authorize(call.caller, Role.StoreOnly, tx, 'NotStore', 'Only the assigned store can extend the deadline');
        requirePositive(extension, 'Extension');

        return decision(TransactionAction.DEADLINE_EXTENDED, {
            ...tx,
            deadline: requireTimestamp(tx.deadline + extension),
            updatedAt: call.now
        });
    }

    partialRefund(tx: EscrowTransaction, call: Invocation, amount: number): Decision {
        authorize(call.caller, Role.StoreOnly, tx, 'NotStore', 'Only the assigned store can issue a partial refund');
        requirePositive(amount, 'Amount');

        const custody = new Custody(tx.escrow);
        const refunded = custody.withdraw(amount);

        return decision(
            TransactionAction.PARTIALLY_REFUNDED,
            {
                ...tx,
                escrow: custody.balance,
                totalWithdrawn: tx.totalWithdrawn + refunded,
                updatedAt: call.now
            },
            { payouts: payout(tx.customer, refunded) }
        );
    }

    private completeWork(tx: EscrowTransaction, call: Invocation, action: TransactionAction): Decision {
        requireStore(tx);
        authorize(call.caller, Role.StoreOnly, tx, 'InvalidItem', 'Only the assigned store can fulfil this transaction');
        requireWithinWindow(call.now, tx.deadline);

        return decision(action, {
            ...tx,
            fulfilled: true,
            status: TransactionStatus.FULFILLED,
            updatedAt: call.now
        });
    }

    private refundAll(
        tx: EscrowTransaction,
        call: Invocation,
        action: TransactionAction,
        status: TransactionStatus
    ): Decision {
        const withdrawal = withdrawAll(tx);
        return decision(action, resetEpisode({ ...tx, ...custodyFields(withdrawal) }, status, call.now), {
            payouts: payout(tx.customer, withdrawal.amount)
        });
    }

    private requireEditable(tx: EscrowTransaction, call: Invocation): void {
        authorize(call.caller, Role.CustomerOnly, tx, 'NotStore', 'Only the customer can update transaction details');
        if (isSome(tx.store)) {
            throw new EscrowError('InvalidTransaction', 'Details cannot change once a store has accepted');
        }
    }

    private requireRating(rating: number): void {
        const { ratingMin, ratingMax } = this.config;
        if (!Number.isInteger(rating) || rating < ratingMin || rating > ratingMax) {
            throw new EscrowError('InvalidRating', `Rating must be an integer between ${ratingMin} and ${ratingMax}`);
        }
    }
}

function decision(
    action: TransactionAction,
    transaction: EscrowTransaction,
    effects: { deposit?: Option<Deposit>; payouts?: Payout[]; review?: Option<ReviewDraft> } = {}
): Decision {
    return {
        action,
        transaction,
        deposit: effects.deposit ?? none,
        payouts: effects.payouts ?? [],
        review: effects.review ?? none
    };
}

function requireStore(tx: EscrowTransaction): string {
    if (!isSome(tx.store)) {
        throw new EscrowError('InvalidTransaction', `Transaction ${tx.id} has no assigned store`);
    }
    return tx.store.value;
}

function withdrawAll(tx: EscrowTransaction): Withdrawal {
    const custody = new Custody(tx.escrow);
    const amount = custody.withdrawAll();
    return { amount, escrow: custody.balance, totalWithdrawn: tx.totalWithdrawn + amount };
}

function custodyFields(withdrawal: Withdrawal): Pick<EscrowTransaction, 'escrow' | 'totalWithdrawn'> {
    return { escrow: withdrawal.escrow, totalWithdrawn: withdrawal.totalWithdrawn };
}

function resetEpisode(tx: EscrowTransaction, status: TransactionStatus, now: number): EscrowTransaction {
    return {
        ...tx,
        store: none,
        fulfilled: false,
        dispute: false,
        status,
        closed: true,
        updatedAt: now
    };
}

// Zero-value movements are skipped; the ledger never sees them.
function payout(to: string, amount: number): Payout[] {
    return amount > 0 ? [{ to, amount }] : [];
}

function requireNonNegative(value: number, label: string): void {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new EscrowError('InvalidAmount', `${label} must be a non-negative integer`);
    }
}

function requirePositive(value: number, label: string): void {
    if (!Number.isSafeInteger(value) || value <= 0) {
        throw new EscrowError('InvalidAmount', `${label} must be a positive integer`);
    }
}

// Largest instant a JS Date can represent.
const MAX_TIMESTAMP = 8_640_000_000_000_000;

function requireTimestamp(value: number): number {
    if (!Number.isSafeInteger(value) || value > MAX_TIMESTAMP) {
        throw new EscrowError('InvalidAmount', 'Deadline is out of range');
    }
    return value;
}
