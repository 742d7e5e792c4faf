/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import { AccountService } from '../services/AccountService';
import { parseInteger } from './args';
import { BaseContract } from './BaseContract';

@Info({ title: 'AccountContract', description: 'Participant balances used to fund and receive escrow' })
export class AccountContract extends BaseContract {
    constructor() {
        super('account');
    }

    @Transaction()
    @Returns('string')
    async CreditAccount(ctx: Context, owner: string, amount: string): Promise<string> {
        const service = new AccountService(ctx.stub);
        const account = await service.creditAccount(this.invocation(ctx), owner, parseInteger(amount, 'Amount'));
        return JSON.stringify(account);
    }

    @Transaction(false)
    @Returns('number')
    async GetBalance(ctx: Context, owner: string): Promise<number> {
        return new AccountService(ctx.stub).balanceOf(owner);
    }

    // Balance of the calling identity
    @Transaction(false)
    @Returns('number')
    async GetMyBalance(ctx: Context): Promise<number> {
        const client = this.getClient(ctx);
        return new AccountService(ctx.stub).balanceOf(client.id);
    }

    @Transaction(false)
    @Returns('string')
    async ReadAccount(ctx: Context, owner: string): Promise<string> {
        return JSON.stringify(await new AccountService(ctx.stub).readAccount(owner));
    }
}
