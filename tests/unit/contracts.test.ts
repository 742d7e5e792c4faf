/*
 * SPDX-License-Identifier: Apache-2.0
 */

import * as loader from '../../src/config/loader';
import { EscrowContract } from '../../src/contracts/EscrowContract';
import { StatisticsContract } from '../../src/contracts/StatisticsContract';

describe('contracts', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should load the statistics config once, at construction', () => {
        const spy = jest.spyOn(loader, 'loadConfig');

        const contract = new StatisticsContract();

        expect(contract.getName()).toBe('statistics');
        expect(spy).toHaveBeenCalledTimes(1);
    });

    it('should load the escrow config once, at construction', () => {
        const spy = jest.spyOn(loader, 'loadConfig');

        new EscrowContract();

        expect(spy).toHaveBeenCalledTimes(1);
    });
});
