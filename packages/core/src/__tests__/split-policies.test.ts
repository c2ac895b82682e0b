// =============================================================================
// Split Policy Unit Tests
// =============================================================================

import { describe, it, expect } from 'vitest';
import { EqualSplitPolicy, ExactSplitPolicy, PercentageSplitPolicy } from '../split-policies.js';
import { generateParticipantId } from '../participant.js';
import { LedgerError, LedgerErrorCode } from '../errors.js';

const a = generateParticipantId();
const b = generateParticipantId();
const c = generateParticipantId();

describe('SplitPolicies', () => {
    describe('EqualSplitPolicy', () => {
        const policy = new EqualSplitPolicy();

        it('includes the payer in the split', () => {
            const splits = policy.split({ payerId: a, amount: 300, participantIds: [a, b, c] });
            expect(splits).toEqual(new Map([[a, 100], [b, 100], [c, 100]]));
        });

        it('gives leftover units to the earliest participants', () => {
            const splits = policy.split({ payerId: c, amount: 200, participantIds: [a, b, c] });
            expect(Array.from(splits.values())).toEqual([67, 67, 66]);
        });

        it('ignores custom shares', () => {
            const splits = policy.split({
                payerId: a,
                amount: 10,
                participantIds: [a, b],
                customShares: new Map([[a, 9], [b, 1]]),
            });
            expect(splits).toEqual(new Map([[a, 5], [b, 5]]));
        });

        it('rejects an empty participant set', () => {
            expect(() => policy.split({ payerId: a, amount: 10, participantIds: [] })).toThrow(
                'Cannot split an expense among zero participants',
            );
        });
    });

    describe('ExactSplitPolicy', () => {
        const policy = new ExactSplitPolicy();

        it('returns the given shares', () => {
            const customShares = new Map([[a, 100], [b, 200], [c, 100]]);
            const splits = policy.split({ payerId: b, amount: 400, participantIds: [a, b, c], customShares });
            expect(splits).toEqual(customShares);
            expect(splits).not.toBe(customShares);
        });

        it('requires custom shares', () => {
            expect(() => policy.split({ payerId: a, amount: 100, participantIds: [a, b] })).toThrow(
                new LedgerError(LedgerErrorCode.MissingCustomShares, 'Custom shares required for exact split'),
            );
            expect(() => policy.split({
                payerId: a,
                amount: 100,
                participantIds: [a, b],
                customShares: new Map(),
            })).toThrow('Custom shares required for exact split');
        });

        it('rejects shares that do not sum to the amount', () => {
            expect(() => policy.split({
                payerId: a,
                amount: 100,
                participantIds: [a, b],
                customShares: new Map([[a, 50], [b, 49]]),
            })).toThrow('Custom split amounts sum to 99, expected 100');
        });

        it('rejects fractional shares', () => {
            expect(() => policy.split({
                payerId: a,
                amount: 100,
                participantIds: [a, b],
                customShares: new Map([[a, 50.5], [b, 49.5]]),
            })).toThrow(`Exact share for ${a} must be an integer number of minor units`);
        });
    });

    describe('PercentageSplitPolicy', () => {
        const policy = new PercentageSplitPolicy();

        it('converts percentages into amounts', () => {
            const splits = policy.split({
                payerId: c,
                amount: 500,
                participantIds: [a, b, c],
                customShares: new Map([[a, 40], [b, 40], [c, 20]]),
            });
            expect(splits).toEqual(new Map([[a, 200], [b, 200], [c, 100]]));
        });

        it('allocates the rounding remainder without losing a unit', () => {
            const splits = policy.split({
                payerId: a,
                amount: 5,
                participantIds: [a, b],
                customShares: new Map([[a, 50], [b, 50]]),
            });
            expect(splits).toEqual(new Map([[a, 3], [b, 2]]));
        });

        it('requires percentages to sum to 100', () => {
            expect(() => policy.split({
                payerId: a,
                amount: 100,
                participantIds: [a, b],
                customShares: new Map([[a, 50], [b, 40]]),
            })).toThrow('Percentage splits sum to 90%, expected 100%');
        });

        it('honours a wider tolerance', () => {
            const lenient = new PercentageSplitPolicy(0.5);
            const splits = lenient.split({
                payerId: a,
                amount: 1000,
                participantIds: [a, b],
                customShares: new Map([[a, 50], [b, 49.8]]),
            });
            expect(Array.from(splits.values()).reduce((x, y) => x + y, 0)).toBe(1000);
        });

        it('requires custom shares', () => {
            expect(() => policy.split({ payerId: a, amount: 100, participantIds: [a] })).toThrow(
                'Custom shares required for percentage split',
            );
        });
    });
});
