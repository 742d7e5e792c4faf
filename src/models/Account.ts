/*
 * SPDX-License-Identifier: Apache-2.0
 */

export interface Account {
    id: string;             // "account:<owner>"
    docType: 'account';
    owner: string;          // Client identity of the holder
    balance: number;
    createdAt: number;
    updatedAt: number;
}
