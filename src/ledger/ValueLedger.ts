/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Account } from '../models/Account';

/**
 * Moves value between participant accounts and transaction custody.
 * Each call is all-or-nothing.
 */
export interface ValueLedger {
    /** Debits the source account; the caller credits the custody record. */
    depositIntoCustody(source: string, amount: number, now: number): Promise<void>;

    /** Credits a principal with value taken out of custody. */
    transfer(amount: number, to: string, now: number): Promise<void>;

    /** Returns the account as written; reads in the same invocation do not see it yet. */
    credit(owner: string, amount: number, now: number): Promise<Account>;

    balanceOf(owner: string): Promise<number>;
}
