/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { defaultConfig, loadConfig } from '../../src/config/loader';

describe('loadConfig()', () => {
    it('should fall back to defaults', () => {
        expect(defaultConfig()).toEqual({
            ratingMin: 1,
            ratingMax: 5,
            reviewVisibility: 'store',
            disputeResolution: 'counterparty'
        });
    });

    it('should read settings from the environment', () => {
        const config = loadConfig({
            ESCROW_RATING_MIN: '0',
            ESCROW_RATING_MAX: '10',
            ESCROW_REVIEW_VISIBILITY: 'customer',
            ESCROW_DISPUTE_RESOLUTION: 'customer'
        });

        expect(config).toEqual({
            ratingMin: 0,
            ratingMax: 10,
            reviewVisibility: 'customer',
            disputeResolution: 'customer'
        });
    });

    it('should ignore empty variables', () => {
        expect(loadConfig({ ESCROW_RATING_MAX: '' }).ratingMax).toBe(5);
    });

    it('should reject unknown policies', () => {
        expect(() => loadConfig({ ESCROW_REVIEW_VISIBILITY: 'everyone' })).toThrow(/^Invalid config:\n  reviewVisibility: /);
    });

    it('should reject an inverted rating range', () => {
        expect(() => loadConfig({ ESCROW_RATING_MIN: '6' })).toThrow(
            'Invalid config:\n  ratingMin: ratingMin must not exceed ratingMax'
        );
    });
});
