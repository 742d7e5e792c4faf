/*
 * SPDX-License-Identifier: Apache-2.0
 */

import pino from 'pino';
import { WorldStateLedger } from '../../src/ledger/WorldStateLedger';
import { some } from '../../src/models/Option';
import { AccountService } from '../../src/services/AccountService';
import { AccountsRepository } from '../../src/storage/repositories/accounts';
import { call, MemoryWorldState } from '../helpers/memory-state';

describe('WorldStateLedger', () => {
    let state: MemoryWorldState;
    let ledger: WorldStateLedger;

    beforeEach(() => {
        state = new MemoryWorldState();
        ledger = new WorldStateLedger(new AccountsRepository(state));
    });

    it('should open an account on first credit', async () => {
        const account = await state.invoke(() => ledger.credit('alice', 30, 5));
        const expected = {
            id: 'account:alice',
            docType: 'account',
            owner: 'alice',
            balance: 30,
            createdAt: 5,
            updatedAt: 5
        };
        expect(account).toEqual(expected);
        expect(state.json('account:alice')).toEqual(expected);
    });

    it('should return the credited account before it is committed', async () => {
        const account = await ledger.credit('alice', 30, 5);

        expect(account.balance).toBe(30);
        expect(await ledger.balanceOf('alice')).toBe(0);
        state.commit();
        expect(await ledger.balanceOf('alice')).toBe(30);
    });

    it('should debit deposits and credit transfers', async () => {
        await state.invoke(() => ledger.credit('alice', 30, 5));
        await state.invoke(() => ledger.depositIntoCustody('alice', 20, 6));
        await state.invoke(() => ledger.transfer(20, 'bob', 7));

        expect(await ledger.balanceOf('alice')).toBe(10);
        expect(await ledger.balanceOf('bob')).toBe(20);
    });

    it('should refuse deposits beyond the balance', async () => {
        await state.invoke(() => ledger.credit('alice', 30, 5));
        await expect(state.invoke(() => ledger.depositIntoCustody('alice', 31, 6))).rejects.toMatchObject({
            code: 'InsufficientFunds'
        });
        await expect(state.invoke(() => ledger.depositIntoCustody('carol', 1, 6))).rejects.toMatchObject({
            code: 'InsufficientFunds'
        });
        expect(await ledger.balanceOf('alice')).toBe(30);
    });

    it('should refuse a credit whose balance is not a safe integer', async () => {
        await state.invoke(() => ledger.credit('alice', Number.MAX_SAFE_INTEGER, 5));

        await expect(state.invoke(() => ledger.credit('alice', 2, 6))).rejects.toMatchObject({ code: 'InvalidAmount' });
        expect(await ledger.balanceOf('alice')).toBe(Number.MAX_SAFE_INTEGER);
    });
});

describe('AccountService', () => {
    const silent = pino({ level: 'silent' });
    let state: MemoryWorldState;
    let service: AccountService;

    beforeEach(() => {
        state = new MemoryWorldState();
        service = new AccountService(state, silent);
    });

    it('should only let admins credit accounts', async () => {
        await expect(state.invoke(() => service.creditAccount(call('mallory', 1), 'mallory', 1000))).rejects.toMatchObject({
            code: 'NotStore'
        });
        await expect(
            state.invoke(() => service.creditAccount(call('mallory', 1, 'buyer'), 'mallory', 1000))
        ).rejects.toMatchObject({ code: 'NotStore' });

        const account = await state.invoke(() => service.creditAccount(call('ops', 2, 'admin'), 'alice', 50));
        expect(account.balance).toBe(50);
        expect(await service.readAccount('alice')).toEqual(account);
    });

    it('should credit a new account and accumulate later credits across invocations', async () => {
        const first = await state.invoke(() => service.creditAccount(call('ops', 2, 'admin'), 'alice', 50));
        const second = await state.invoke(() => service.creditAccount(call('ops', 3, 'admin'), 'alice', 50));

        expect(first).toMatchObject({ balance: 50, createdAt: 2, updatedAt: 2 });
        expect(second).toMatchObject({ balance: 100, createdAt: 2, updatedAt: 3 });
        expect(await service.balanceOf('alice')).toBe(100);
    });

    it('should leave the balance unchanged when a credit would overflow it', async () => {
        await state.invoke(() => service.creditAccount(call('ops', 2, 'admin'), 'alice', Number.MAX_SAFE_INTEGER));

        await expect(
            state.invoke(() => service.creditAccount(call('ops', 3, 'admin'), 'alice', 2))
        ).rejects.toMatchObject({ code: 'InvalidAmount' });
        expect(await service.balanceOf('alice')).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('should report NotFound for unknown accounts', async () => {
        await expect(service.readAccount('nobody')).rejects.toMatchObject({ code: 'NotFound' });
        expect(await service.balanceOf('nobody')).toBe(0);
    });

    it('should read the admin role from the invocation', () => {
        expect(call('ops', 2, 'admin').role).toEqual(some('admin'));
    });
});
