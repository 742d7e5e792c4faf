/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { EscrowError } from '../errors';

// Chaincode arguments always arrive as strings.
const IntegerArg = z.string().trim().regex(/^\d+$/).transform(Number);
const BooleanArg = z.enum(['true', 'false']).transform((value) => value === 'true');

export function parseInteger(value: string, label: string): number {
    const result = IntegerArg.safeParse(value);
    if (!result.success) {
        throw new EscrowError('InvalidAmount', `${label} must be a non-negative integer, got "${value}"`);
    }
    return result.data;
}

export function parseBoolean(value: string, label: string): boolean {
    const result = BooleanArg.safeParse(value);
    if (!result.success) {
        throw new EscrowError('InvalidTransaction', `${label} must be "true" or "false", got "${value}"`);
    }
    return result.data;
}
