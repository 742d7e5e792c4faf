/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError } from '../errors';

/**
 * Non-negative balance held for one transaction. Amounts are integers in the
 * same unit as the transaction price.
 */
export class Custody {
    private current: number;

    constructor(balance = 0) {
        assertAmount(balance);
        this.current = balance;
    }

    static empty(): Custody {
        return new Custody(0);
    }

    get balance(): number {
        return this.current;
    }

    deposit(amount: number): void {
        assertAmount(amount);
        if (!Number.isSafeInteger(this.current + amount)) {
            throw new EscrowError('InvalidAmount', `Depositing ${amount} would overflow escrow ${this.current}`);
        }
        this.current += amount;
    }

    withdrawAll(): number {
        const amount = this.current;
        this.current = 0;
        return amount;
    }

    withdraw(amount: number): number {
        assertAmount(amount);
        if (amount > this.current) {
            throw new EscrowError('InsufficientEscrow', `Cannot withdraw ${amount}, escrow holds ${this.current}`);
        }
        this.current -= amount;
        return amount;
    }
}

function assertAmount(amount: number): void {
    if (!Number.isSafeInteger(amount) || amount < 0) {
        throw new EscrowError('InvalidAmount', `Amount must be a non-negative integer, got ${amount}`);
    }
}
