/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError, isEscrowError } from '../errors';
import { TransactionEngine } from '../engine/TransactionEngine';
import type { CreateTransactionInput, Decision, Invocation, TransactionEvent } from '../engine/types';
import { WorldStateLedger } from '../ledger/WorldStateLedger';
import type { ValueLedger } from '../ledger/ValueLedger';
import type { EscrowTransaction } from '../models/EscrowTransaction';
import type { ItemReview } from '../models/ItemReview';
import { none, some } from '../models/Option';
import type { StoreStatistics } from '../models/StoreStatistics';
import { ReviewRecorder } from '../reviews/ReviewRecorder';
import { applyRelease } from '../reviews/StatisticsAggregator';
import { AccountsRepository } from '../storage/repositories/accounts';
import { ReviewsRepository } from '../storage/repositories/reviews';
import { StatisticsRepository } from '../storage/repositories/statistics';
import { TransactionsRepository } from '../storage/repositories/transactions';
import { encode, type WorldState } from '../storage/state';
import type { Config } from '../types/config';
import { createLogger, type Logger } from '../utils/logger';

/**
 * Runs lifecycle operations against world state. Each call reads the record
 * once, asks the engine for a decision and writes every effect of that
 * decision. Steps that can fail run before the first write.
 */
export class EscrowService {
    private readonly transactions: TransactionsRepository;
    private readonly reviews: ReviewsRepository;
    private readonly statistics: StatisticsRepository;
    private readonly ledger: ValueLedger;
    private readonly engine: TransactionEngine;
    private readonly recorder: ReviewRecorder;

    constructor(
        private readonly state: WorldState,
        config: Config,
        private readonly logger: Logger = createLogger('escrow-service')
    ) {
        this.transactions = new TransactionsRepository(state);
        this.reviews = new ReviewsRepository(state);
        this.statistics = new StatisticsRepository(state);
        this.ledger = new WorldStateLedger(new AccountsRepository(state));
        this.engine = new TransactionEngine(config);
        this.recorder = new ReviewRecorder(config.reviewVisibility);
    }

    async createTransaction(call: Invocation, input: CreateTransactionInput): Promise<EscrowTransaction> {
        if (await this.transactions.exists(call.txId)) {
            throw new EscrowError('InvalidTransaction', `Transaction ${call.txId} already exists`);
        }
        const decision = this.decide(call, call.txId, () => this.engine.create(call, input));
        return this.apply(call, decision);
    }

    acceptTransaction(call: Invocation, id: string): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.accept(tx, call));
    }

    fulfillTransaction(call: Invocation, id: string): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.fulfill(tx, call));
    }

    markComplete(call: Invocation, id: string): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.markComplete(tx, call));
    }

    disputeTransaction(call: Invocation, id: string): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.dispute(tx, call));
    }

    resolveDispute(call: Invocation, id: string, resolved: boolean): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.resolveDispute(tx, call, resolved));
    }

    releasePayment(call: Invocation, id: string, review: string, rating: number): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.releasePayment(tx, call, review, rating));
    }

    addFunds(call: Invocation, id: string, amount: number): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.addFunds(tx, call, amount));
    }

    cancelTransaction(call: Invocation, id: string): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.cancel(tx, call));
    }

    requestRefund(call: Invocation, id: string): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.requestRefund(tx, call));
    }

    rateStore(call: Invocation, id: string, rating: number): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.rateStore(tx, call, rating));
    }

    updateItem(call: Invocation, id: string, item: string): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.updateItem(tx, call, item));
    }

    updatePrice(call: Invocation, id: string, price: number): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.updatePrice(tx, call, price));
    }

    updateQuantity(call: Invocation, id: string, quantity: number): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.updateQuantity(tx, call, quantity));
    }

    updateDeadline(call: Invocation, id: string, deadline: number): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.updateDeadline(tx, call, deadline));
    }

    updateStatus(call: Invocation, id: string, status: string): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.updateStatus(tx, call, status));
    }

    extendDeadline(call: Invocation, id: string, extension: number): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.extendDeadline(tx, call, extension));
    }

    partialRefund(call: Invocation, id: string, amount: number): Promise<EscrowTransaction> {
        return this.run(call, id, (tx) => this.engine.partialRefund(tx, call, amount));
    }

    getTransaction(id: string): Promise<EscrowTransaction> {
        return this.transactions.getById(id);
    }

    async getStoreStatistics(store: string): Promise<StoreStatistics> {
        const stats = await this.statistics.findByStore(store);
        if (!stats) {
            throw new EscrowError('NotFound', `No statistics recorded for ${store}`);
        }
        return stats;
    }

    async readReview(call: Invocation, transactionId: string, episode: number): Promise<ItemReview> {
        const review = await this.reviews.find(transactionId, episode);
        if (!review) {
            throw new EscrowError('NotFound', `No review for ${transactionId} episode ${episode}`);
        }
        if (!this.recorder.canRead(review, call.caller)) {
            throw new EscrowError('NotStore', 'Caller cannot read this review');
        }
        return review;
    }

    private async run(
        call: Invocation,
        id: string,
        decide: (tx: EscrowTransaction) => Decision
    ): Promise<EscrowTransaction> {
        const tx = await this.transactions.getById(id);
        const decision = this.decide(call, id, () => decide(tx));
        return this.apply(call, decision);
    }

    private decide(call: Invocation, id: string, decide: () => Decision): Decision {
        try {
            return decide();
        } catch (error) {
            if (isEscrowError(error)) {
                this.logger.warn({ transactionId: id, caller: call.caller, code: error.code }, error.message);
            }
            throw error;
        }
    }

    private async apply(call: Invocation, decision: Decision): Promise<EscrowTransaction> {
        const tx = decision.transaction;

        if (decision.deposit.kind === 'some') {
            const { from, amount } = decision.deposit.value;
            await this.ledger.depositIntoCustody(from, amount, call.now);
        }

        if (decision.review.kind === 'some') {
            const draft = decision.review.value;
            const revenue = decision.payouts
                .filter((p) => p.to === draft.store)
                .reduce((sum, p) => sum + p.amount, 0);

            await this.reviews.create(this.recorder.record(draft, tx.id, tx.episode, call.now));

            const existing = await this.statistics.findByStore(draft.store);
            await this.statistics.save(
                applyRelease(existing ? some(existing) : none, draft.store, revenue, draft.rating, call.now)
            );
        }

        for (const payout of decision.payouts) {
            await this.ledger.transfer(payout.amount, payout.to, call.now);
        }

        await this.transactions.save(tx);

        const event: TransactionEvent = {
            transactionId: tx.id,
            action: decision.action,
            episode: tx.episode,
            timestamp: call.now
        };
        this.state.setEvent(decision.action, encode(event));

        this.logger.info(
            {
                transactionId: tx.id,
                action: decision.action,
                status: tx.status,
                escrow: tx.escrow,
                payouts: decision.payouts
            },
            `${decision.action} applied`
        );

        return tx;
    }
}
