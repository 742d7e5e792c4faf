/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { StoreStatistics } from '../../models/StoreStatistics';
import { statisticsKey } from '../../reviews/StatisticsAggregator';
import { StoreStatisticsSchema } from '../schemas';
import { readRecord, writeRecord, type WorldState } from '../state';

export class StatisticsRepository {
    constructor(private state: WorldState) {}

    async findByStore(store: string): Promise<StoreStatistics | undefined> {
        return readRecord(this.state, statisticsKey(store), StoreStatisticsSchema);
    }

    async save(stats: StoreStatistics): Promise<void> {
        await writeRecord(this.state, stats.id, stats);
    }
}
