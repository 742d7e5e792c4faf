/*
 * SPDX-License-Identifier: Apache-2.0
 */

import 'reflect-metadata';
import { type Contract } from 'fabric-contract-api';
import { AccountContract } from './contracts/AccountContract';
import { EscrowContract } from './contracts/EscrowContract';
import { StatisticsContract } from './contracts/StatisticsContract';

export { AccountContract, EscrowContract, StatisticsContract };
export { EscrowError, parseErrorCode, type EscrowErrorCode } from './errors';
export { TransactionStatus, type EscrowTransaction } from './models/EscrowTransaction';

export const contracts: typeof Contract[] = [
    EscrowContract,
    AccountContract,
    StatisticsContract
];
