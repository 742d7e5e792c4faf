/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigSchema, type Config } from '../types/config';

// Chaincode settings come from the container environment set in the chaincode package.
const ENV_KEYS: Record<keyof Config, string> = {
    ratingMin: 'ESCROW_RATING_MIN',
    ratingMax: 'ESCROW_RATING_MAX',
    reviewVisibility: 'ESCROW_REVIEW_VISIBILITY',
    disputeResolution: 'ESCROW_DISPUTE_RESOLUTION'
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const raw: Record<string, string> = {};
    for (const [field, envVar] of Object.entries(ENV_KEYS)) {
        const value = env[envVar];
        if (value !== undefined && value !== '') {
            raw[field] = value;
        }
    }

    const result = ConfigSchema.safeParse(raw);

    if (!result.success) {
        const errors = result.error.errors
            .map((e) => `  ${e.path.join('.')}: ${e.message}`)
            .join('\n');
        throw new Error(`Invalid config:\n${errors}`);
    }

    return result.data;
}

export function defaultConfig(): Config {
    return loadConfig({});
}
