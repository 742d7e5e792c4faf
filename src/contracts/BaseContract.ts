/*
 * SPDX-License-Identifier: Apache-2.0
 */

import 'reflect-metadata';
import { Contract, Context } from 'fabric-contract-api';
import type { z } from 'zod';
import type { Invocation } from '../engine/types';
import { none, some } from '../models/Option';
import { decode } from '../storage/state';

export class BaseContract extends Contract {
    constructor(name: string) {
        super(name);
    }

    // Helper: Get Client Identity & Role
    protected getClient(ctx: Context) {
        const cid = ctx.clientIdentity;
        return {
            id: cid.getID(),
            mspId: cid.getMSPID(),
            role: cid.getAttributeValue('role')
        };
    }

    // Helper: Identity, tx id and proposal time for this invocation
    protected invocation(ctx: Context): Invocation {
        const client = this.getClient(ctx);
        return {
            caller: client.id,
            role: client.role ? some(client.role) : none,
            txId: ctx.stub.getTxID(),
            now: ctx.stub.getDateTimestamp().getTime()
        };
    }

    // Helper: CouchDB rich query, each hit validated against the record schema
    protected async queryBySelector<S extends z.ZodTypeAny>(
        ctx: Context,
        selector: Record<string, unknown>,
        schema: S
    ): Promise<z.infer<S>[]> {
        const iterator = await ctx.stub.getQueryResult(JSON.stringify(selector));
        const results: z.infer<S>[] = [];
        try {
            let result = await iterator.next();
            while (!result.done) {
                if (result.value && result.value.value) {
                    results.push(schema.parse(decode(result.value.value)));
                }
                result = await iterator.next();
            }
        } finally {
            await iterator.close();
        }
        return results;
    }
}
