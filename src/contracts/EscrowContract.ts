/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import { loadConfig } from '../config/loader';
import type { EscrowTransaction } from '../models/EscrowTransaction';
import { EscrowService } from '../services/EscrowService';
import { EscrowTransactionSchema } from '../storage/schemas';
import type { Config } from '../types/config';
import { parseBoolean, parseInteger } from './args';
import { BaseContract } from './BaseContract';

@Info({ title: 'EscrowContract', description: 'Marketplace transaction lifecycle with escrowed payment' })
export class EscrowContract extends BaseContract {
    private readonly config: Config;

    constructor() {
        super('escrow');
        this.config = loadConfig();
    }

    private service(ctx: Context): EscrowService {
        return new EscrowService(ctx.stub, this.config);
    }

    // --- Lifecycle ---

    @Transaction()
    @Returns('string')
    async CreateTransaction(ctx: Context, item: string, quantity: string, price: string, duration: string): Promise<string> {
        const tx = await this.service(ctx).createTransaction(this.invocation(ctx), {
            item,
            quantity: parseInteger(quantity, 'Quantity'),
            price: parseInteger(price, 'Price'),
            duration: parseInteger(duration, 'Duration')
        });
        return toJson(tx);
    }

    @Transaction()
    @Returns('string')
    async AcceptTransaction(ctx: Context, transactionId: string): Promise<string> {
        return toJson(await this.service(ctx).acceptTransaction(this.invocation(ctx), transactionId));
    }

    @Transaction()
    @Returns('string')
    async FulfillTransaction(ctx: Context, transactionId: string): Promise<string> {
        return toJson(await this.service(ctx).fulfillTransaction(this.invocation(ctx), transactionId));
    }

    @Transaction()
    @Returns('string')
    async MarkComplete(ctx: Context, transactionId: string): Promise<string> {
        return toJson(await this.service(ctx).markComplete(this.invocation(ctx), transactionId));
    }

    @Transaction()
    @Returns('string')
    async DisputeTransaction(ctx: Context, transactionId: string): Promise<string> {
        return toJson(await this.service(ctx).disputeTransaction(this.invocation(ctx), transactionId));
    }

    @Transaction()
    @Returns('string')
    async ResolveDispute(ctx: Context, transactionId: string, resolved: string): Promise<string> {
        const decision = parseBoolean(resolved, 'Resolved');
        return toJson(await this.service(ctx).resolveDispute(this.invocation(ctx), transactionId, decision));
    }

    @Transaction()
    @Returns('string')
    async ReleasePayment(ctx: Context, transactionId: string, review: string, rating: string): Promise<string> {
        const tx = await this.service(ctx).releasePayment(
            this.invocation(ctx),
            transactionId,
            review,
            parseInteger(rating, 'Rating')
        );
        return toJson(tx);
    }

    @Transaction()
    @Returns('string')
    async AddFunds(ctx: Context, transactionId: string, amount: string): Promise<string> {
        const tx = await this.service(ctx).addFunds(this.invocation(ctx), transactionId, parseInteger(amount, 'Amount'));
        return toJson(tx);
    }

    @Transaction()
    @Returns('string')
    async CancelTransaction(ctx: Context, transactionId: string): Promise<string> {
        return toJson(await this.service(ctx).cancelTransaction(this.invocation(ctx), transactionId));
    }

    @Transaction()
    @Returns('string')
    async RequestRefund(ctx: Context, transactionId: string): Promise<string> {
        return toJson(await this.service(ctx).requestRefund(this.invocation(ctx), transactionId));
    }

    @Transaction()
    @Returns('string')
    async PartialRefund(ctx: Context, transactionId: string, amount: string): Promise<string> {
        const tx = await this.service(ctx).partialRefund(this.invocation(ctx), transactionId, parseInteger(amount, 'Amount'));
        return toJson(tx);
    }

    @Transaction()
    @Returns('string')
    async RateStore(ctx: Context, transactionId: string, rating: string): Promise<string> {
        const tx = await this.service(ctx).rateStore(this.invocation(ctx), transactionId, parseInteger(rating, 'Rating'));
        return toJson(tx);
    }

    @Transaction()
    @Returns('string')
    async ExtendDeadline(ctx: Context, transactionId: string, extension: string): Promise<string> {
        const tx = await this.service(ctx).extendDeadline(
            this.invocation(ctx),
            transactionId,
            parseInteger(extension, 'Extension')
        );
        return toJson(tx);
    }

    // --- Detail updates (customer, before acceptance) ---

    @Transaction()
    @Returns('string')
    async UpdateItem(ctx: Context, transactionId: string, item: string): Promise<string> {
        return toJson(await this.service(ctx).updateItem(this.invocation(ctx), transactionId, item));
    }

    @Transaction()
    @Returns('string')
    async UpdatePrice(ctx: Context, transactionId: string, price: string): Promise<string> {
        const tx = await this.service(ctx).updatePrice(this.invocation(ctx), transactionId, parseInteger(price, 'Price'));
        return toJson(tx);
    }

    @Transaction()
    @Returns('string')
    async UpdateQuantity(ctx: Context, transactionId: string, quantity: string): Promise<string> {
        const tx = await this.service(ctx).updateQuantity(
            this.invocation(ctx),
            transactionId,
            parseInteger(quantity, 'Quantity')
        );
        return toJson(tx);
    }

    @Transaction()
    @Returns('string')
    async UpdateDeadline(ctx: Context, transactionId: string, deadline: string): Promise<string> {
        const tx = await this.service(ctx).updateDeadline(
            this.invocation(ctx),
            transactionId,
            parseInteger(deadline, 'Deadline')
        );
        return toJson(tx);
    }

    @Transaction()
    @Returns('string')
    async UpdateStatus(ctx: Context, transactionId: string, status: string): Promise<string> {
        return toJson(await this.service(ctx).updateStatus(this.invocation(ctx), transactionId, status));
    }

    // --- Reads ---

    @Transaction(false)
    @Returns('string')
    async GetDetails(ctx: Context, transactionId: string): Promise<string> {
        return toJson(await this.service(ctx).getTransaction(transactionId));
    }

    @Transaction(false)
    @Returns('string')
    async GetItem(ctx: Context, transactionId: string): Promise<string> {
        return (await this.service(ctx).getTransaction(transactionId)).item;
    }

    @Transaction(false)
    @Returns('number')
    async GetPrice(ctx: Context, transactionId: string): Promise<number> {
        return (await this.service(ctx).getTransaction(transactionId)).price;
    }

    @Transaction(false)
    @Returns('string')
    async GetStatus(ctx: Context, transactionId: string): Promise<string> {
        return (await this.service(ctx).getTransaction(transactionId)).status;
    }

    @Transaction(false)
    @Returns('number')
    async GetDeadline(ctx: Context, transactionId: string): Promise<number> {
        return (await this.service(ctx).getTransaction(transactionId)).deadline;
    }

    @Transaction(false)
    @Returns('string')
    async ReadReview(ctx: Context, transactionId: string, episode: string): Promise<string> {
        const review = await this.service(ctx).readReview(
            this.invocation(ctx),
            transactionId,
            parseInteger(episode, 'Episode')
        );
        return JSON.stringify(review);
    }

    @Transaction(false)
    @Returns('string')
    async QueryTransactionsByCustomer(ctx: Context, customer: string): Promise<string> {
        const selector = {
            selector: { docType: 'transaction', customer }
        };
        return JSON.stringify(await this.queryBySelector(ctx, selector, EscrowTransactionSchema));
    }

    @Transaction(false)
    @Returns('string')
    async QueryTransactionsByStore(ctx: Context, store: string): Promise<string> {
        const selector = {
            selector: { docType: 'transaction', 'store.kind': 'some', 'store.value': store }
        };
        return JSON.stringify(await this.queryBySelector(ctx, selector, EscrowTransactionSchema));
    }
}

function toJson(tx: EscrowTransaction): string {
    return JSON.stringify(tx);
}
