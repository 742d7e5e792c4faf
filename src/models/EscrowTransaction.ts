/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Option } from './Option';

export enum TransactionStatus {
    OPEN = 'OPEN',             // Waiting for a store
    ACCEPTED = 'ACCEPTED',     // Store assigned
    FULFILLED = 'FULFILLED',   // Store marked the work done
    DISPUTED = 'DISPUTED',     // Customer opened a dispute
    RESOLVED = 'RESOLVED',     // Dispute settled, escrow paid out
    COMPLETED = 'COMPLETED',   // Escrow released to the store
    CANCELLED = 'CANCELLED',
    REFUNDED = 'REFUNDED'
}

export interface EscrowTransaction {
    id: string;             // Fabric tx id of the creating call
    docType: 'transaction';

    customer: string;
    store: Option<string>;  // Set by accept, cleared on every episode reset

    // Purchase details
    item: string;
    quantity: number;
    price: number;

    // Custody
    escrow: number;
    totalDeposited: number;
    totalWithdrawn: number;

    dispute: boolean;
    fulfilled: boolean;
    rating: Option<number>;

    status: TransactionStatus;
    episode: number;
    closed: boolean;        // Set when an episode is paid out or unwound; the next accept opens a new one

    // Epoch milliseconds
    createdAt: number;
    deadline: number;
    updatedAt: number;
}
