/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { EscrowError } from '../errors';

export function isBefore(now: number, deadline: number): boolean {
    return now < deadline;
}

export function isAfter(now: number, deadline: number): boolean {
    return now > deadline;
}

// Fulfilment has to land inside the window.
export function requireWithinWindow(now: number, deadline: number): void {
    if (!isBefore(now, deadline)) {
        throw new EscrowError('DeadlinePassed', `Deadline ${deadline} has passed (now ${now})`);
    }
}

// Payment release waits until the window (and with it the dispute period) is over.
export function requireWindowElapsed(now: number, deadline: number): void {
    if (!isAfter(now, deadline)) {
        throw new EscrowError('DeadlinePassed', `Payment cannot be released until after ${deadline} (now ${now})`);
    }
}
