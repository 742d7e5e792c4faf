/*
 * SPDX-License-Identifier: Apache-2.0
 */

export const ESCROW_ERROR_CODES = [
    'InvalidTransaction',
    'InvalidItem',
    'Dispute',
    'AlreadyResolved',
    'NotStore',
    'InvalidWithdrawal',
    'DeadlinePassed',
    'InsufficientEscrow',
    'InvalidRating',
    'InvalidAmount',
    'InsufficientFunds',
    'NotFound'
] as const;

export type EscrowErrorCode = typeof ESCROW_ERROR_CODES[number];

/**
 * Rejection of a chaincode invocation. Fabric clients only see the message,
 * so it always starts with the code: "NotStore: Only the customer can add funds".
 */
export class EscrowError extends Error {
    readonly code: EscrowErrorCode;

    constructor(code: EscrowErrorCode, detail: string) {
        super(`${code}: ${detail}`);
        this.name = 'EscrowError';
        this.code = code;
    }
}

export function isEscrowError(error: unknown): error is EscrowError {
    return error instanceof EscrowError;
}

/** Recovers the code from an error message returned by a peer. */
export function parseErrorCode(message: string): EscrowErrorCode | undefined {
    const prefix = message.split(':', 1)[0].trim();
    return ESCROW_ERROR_CODES.find((code) => code === prefix);
}
