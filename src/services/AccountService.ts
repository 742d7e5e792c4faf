/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError } from '../errors';
import type { Invocation } from '../engine/types';
import { WorldStateLedger } from '../ledger/WorldStateLedger';
import type { Account } from '../models/Account';
import { contains } from '../models/Option';
import { AccountsRepository } from '../storage/repositories/accounts';
import type { WorldState } from '../storage/state';
import { createLogger, type Logger } from '../utils/logger';

export const ADMIN_ROLE = 'admin';

export class AccountService {
    private readonly accounts: AccountsRepository;
    private readonly ledger: WorldStateLedger;

    constructor(state: WorldState, private readonly logger: Logger = createLogger('account-service')) {
        this.accounts = new AccountsRepository(state);
        this.ledger = new WorldStateLedger(this.accounts);
    }

    // Value enters the system only through an admin credit.
    async creditAccount(call: Invocation, owner: string, amount: number): Promise<Account> {
        if (!contains(call.role, ADMIN_ROLE)) {
            this.logger.warn({ caller: call.caller, owner }, 'Rejected credit from non-admin caller');
            throw new EscrowError('NotStore', 'Only an admin can credit accounts');
        }
        const account = await this.ledger.credit(owner, amount, call.now);
        this.logger.info({ owner, amount, balance: account.balance }, 'Account credited');
        return account;
    }

    balanceOf(owner: string): Promise<number> {
        return this.ledger.balanceOf(owner);
    }

    readAccount(owner: string): Promise<Account> {
        return this.accounts.getByOwner(owner);
    }
}
