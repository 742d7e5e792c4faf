/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError, type EscrowErrorCode } from '../errors';
import type { EscrowTransaction } from '../models/EscrowTransaction';
import { contains } from '../models/Option';

export enum Role {
    CustomerOnly = 'CustomerOnly',
    StoreOnly = 'StoreOnly',
    CustomerOrStore = 'CustomerOrStore'
}

export function isAuthorized(principal: string, role: Role, tx: EscrowTransaction): boolean {
    const isCustomer = tx.customer === principal;
    const isStore = contains(tx.store, principal);

    switch (role) {
        case Role.CustomerOnly:
            return isCustomer;
        case Role.StoreOnly:
            return isStore;
        case Role.CustomerOrStore:
            return isCustomer || isStore;
    }
}

// Every call site reports its own code even though the check is shared.
export function authorize(
    principal: string,
    role: Role,
    tx: EscrowTransaction,
    code: EscrowErrorCode,
    detail: string
): void {
    if (!isAuthorized(principal, role, tx)) {
        throw new EscrowError(code, detail);
    }
}
