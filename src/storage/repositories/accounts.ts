/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError } from '../../errors';
import type { Account } from '../../models/Account';
import { AccountSchema } from '../schemas';
import { readRecord, writeRecord, type WorldState } from '../state';

export function accountKey(owner: string): string {
    return `account:${owner}`;
}

export class AccountsRepository {
    constructor(private state: WorldState) {}

    async findByOwner(owner: string): Promise<Account | undefined> {
        return readRecord(this.state, accountKey(owner), AccountSchema);
    }

    async getByOwner(owner: string): Promise<Account> {
        const account = await this.findByOwner(owner);
        if (!account) {
            throw new EscrowError('NotFound', `No account for ${owner}`);
        }
        return account;
    }

    async save(account: Account): Promise<void> {
        await writeRecord(this.state, account.id, account);
    }
}
