/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError } from '../errors';
import type { Account } from '../models/Account';
import { accountKey, AccountsRepository } from '../storage/repositories/accounts';
import type { ValueLedger } from './ValueLedger';

export class WorldStateLedger implements ValueLedger {
    constructor(private readonly accounts: AccountsRepository) {}

    async depositIntoCustody(source: string, amount: number, now: number): Promise<void> {
        requireAmount(amount);
        const account = await this.accounts.findByOwner(source);
        const balance = account?.balance ?? 0;
        if (!account || balance < amount) {
            throw new EscrowError('InsufficientFunds', `Balance ${balance} cannot cover ${amount}`);
        }
        await this.accounts.save({ ...account, balance: balance - amount, updatedAt: now });
    }

    async transfer(amount: number, to: string, now: number): Promise<void> {
        await this.credit(to, amount, now);
    }

    // Accounts are opened on first credit; a store never has to register before being paid.
    async credit(owner: string, amount: number, now: number): Promise<Account> {
        requireAmount(amount);
        const account: Account = (await this.accounts.findByOwner(owner)) ?? {
            id: accountKey(owner),
            docType: 'account',
            owner,
            balance: 0,
            createdAt: now,
            updatedAt: now
        };
        const balance = account.balance + amount;
        if (!Number.isSafeInteger(balance)) {
            throw new EscrowError('InvalidAmount', `Crediting ${amount} would overflow balance ${account.balance}`);
        }
        const saved: Account = { ...account, balance, updatedAt: now };
        await this.accounts.save(saved);
        return saved;
    }

    async balanceOf(owner: string): Promise<number> {
        const account = await this.accounts.findByOwner(owner);
        return account?.balance ?? 0;
    }
}

function requireAmount(amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
        throw new EscrowError('InvalidAmount', 'Ledger amounts must be positive integers');
    }
}
