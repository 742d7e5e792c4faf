/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError } from '../../errors';
import type { EscrowTransaction } from '../../models/EscrowTransaction';
import { EscrowTransactionSchema } from '../schemas';
import { decode, writeRecord, type WorldState } from '../state';

export class TransactionsRepository {
    constructor(private state: WorldState) {}

    async findById(id: string): Promise<EscrowTransaction | undefined> {
        const data = await this.state.getState(id);
        if (!data || data.length === 0) {
            return undefined;
        }
        // Another record type under this key is not a transaction.
        const parsed = EscrowTransactionSchema.safeParse(decode(data));
        return parsed.success ? parsed.data : undefined;
    }

    async getById(id: string): Promise<EscrowTransaction> {
        const tx = await this.findById(id);
        if (!tx) {
            throw new EscrowError('NotFound', `Transaction ${id} does not exist`);
        }
        return tx;
    }

    async exists(id: string): Promise<boolean> {
        const data = await this.state.getState(id);
        return data && data.length > 0;
    }

    async save(tx: EscrowTransaction): Promise<void> {
        await writeRecord(this.state, tx.id, tx);
    }
}
