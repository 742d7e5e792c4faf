/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import { loadConfig } from '../config/loader';
import { EscrowService } from '../services/EscrowService';
import type { Config } from '../types/config';
import { BaseContract } from './BaseContract';

@Info({ title: 'StatisticsContract', description: 'Per-store transaction totals and ratings' })
export class StatisticsContract extends BaseContract {
    private readonly config: Config;

    constructor() {
        super('statistics');
        this.config = loadConfig();
    }

    @Transaction(false)
    @Returns('string')
    async GetStoreStatistics(ctx: Context, store: string): Promise<string> {
        const stats = await new EscrowService(ctx.stub, this.config).getStoreStatistics(store);
        return JSON.stringify(stats);
    }
}
