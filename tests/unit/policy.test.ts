/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError } from '../../src/errors';
import { TransactionStatus, type EscrowTransaction } from '../../src/models/EscrowTransaction';
import { none, some } from '../../src/models/Option';
import { authorize, isAuthorized, Role } from '../../src/policy/authorization';
import { isAfter, isBefore, requireWindowElapsed, requireWithinWindow } from '../../src/policy/deadline';

const record = (store: EscrowTransaction['store']): EscrowTransaction => ({
    id: 'tx-1',
    docType: 'transaction',
    customer: 'customer',
    store,
    item: 'widget',
    quantity: 1,
    price: 10,
    escrow: 0,
    totalDeposited: 0,
    totalWithdrawn: 0,
    dispute: false,
    fulfilled: false,
    rating: none,
    status: TransactionStatus.OPEN,
    episode: 1,
    closed: false,
    createdAt: 0,
    deadline: 100,
    updatedAt: 0
});

describe('authorization', () => {
    const accepted = record(some('store'));
    const open = record(none);

    it('should match each role', () => {
        expect(isAuthorized('customer', Role.CustomerOnly, accepted)).toBe(true);
        expect(isAuthorized('store', Role.CustomerOnly, accepted)).toBe(false);
        expect(isAuthorized('store', Role.StoreOnly, accepted)).toBe(true);
        expect(isAuthorized('customer', Role.StoreOnly, accepted)).toBe(false);
        expect(isAuthorized('store', Role.CustomerOrStore, accepted)).toBe(true);
        expect(isAuthorized('other', Role.CustomerOrStore, accepted)).toBe(false);
    });

    it('should deny the store role while no store is assigned', () => {
        expect(isAuthorized('store', Role.StoreOnly, open)).toBe(false);
        expect(isAuthorized('store', Role.CustomerOrStore, open)).toBe(false);
        expect(isAuthorized('customer', Role.CustomerOrStore, open)).toBe(true);
    });

    it('should throw with the call-site code', () => {
        expect(() => authorize('other', Role.StoreOnly, accepted, 'InvalidItem', 'not the store')).toThrow(
            new EscrowError('InvalidItem', 'not the store')
        );
    });
});

describe('deadline', () => {
    it('should compare strictly', () => {
        expect(isBefore(99, 100)).toBe(true);
        expect(isBefore(100, 100)).toBe(false);
        expect(isAfter(101, 100)).toBe(true);
        expect(isAfter(100, 100)).toBe(false);
    });

    it('should leave no instant where both fulfilment and release are allowed', () => {
        for (const now of [99, 100, 101]) {
            const fulfilOk = isBefore(now, 100);
            const releaseOk = isAfter(now, 100);
            expect(fulfilOk && releaseOk).toBe(false);
        }
    });

    it('should raise DeadlinePassed in both directions', () => {
        expect(() => requireWithinWindow(100, 100)).toThrow('DeadlinePassed: Deadline 100 has passed (now 100)');
        expect(() => requireWindowElapsed(100, 100)).toThrow(
            'DeadlinePassed: Payment cannot be released until after 100 (now 100)'
        );
        expect(() => requireWithinWindow(99, 100)).not.toThrow();
        expect(() => requireWindowElapsed(101, 100)).not.toThrow();
    });
});
