/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { z } from 'zod';

/**
 * The part of the chaincode stub the escrow engine writes through.
 * `ctx.stub` satisfies it directly.
 */
export interface WorldState {
    getState(key: string): Promise<Uint8Array>;
    putState(key: string, value: Uint8Array): Promise<void>;
    setEvent(name: string, payload: Uint8Array): void;
}

export function encode(value: unknown): Buffer {
    return Buffer.from(JSON.stringify(value));
}

export function decode(data: Uint8Array): unknown {
    return JSON.parse(Buffer.from(data).toString('utf8'));
}

export async function readRecord<S extends z.ZodTypeAny>(
    state: WorldState,
    key: string,
    schema: S
): Promise<z.infer<S> | undefined> {
    const data = await state.getState(key);
    if (!data || data.length === 0) {
        return undefined;
    }
    return schema.parse(decode(data));
}

export async function writeRecord(state: WorldState, key: string, value: unknown): Promise<void> {
    await state.putState(key, encode(value));
}
