/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const ConfigSchema = z
    .object({
        // Bounds for release and store ratings, inclusive
        ratingMin: z.coerce.number().int().default(1),
        ratingMax: z.coerce.number().int().default(5),

        // Who may read the review written on payment release
        reviewVisibility: z.enum(['store', 'customer']).default('store'),

        // customer: only the customer resolves disputes
        // counterparty: the store may also resolve, but only in the customer's favour
        disputeResolution: z.enum(['customer', 'counterparty']).default('counterparty')
    })
    .refine((config) => config.ratingMin <= config.ratingMax, {
        message: 'ratingMin must not exceed ratingMax',
        path: ['ratingMin']
    });

export type Config = z.infer<typeof ConfigSchema>;
