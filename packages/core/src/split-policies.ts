// =============================================================================
// Potluck — Split Policies
// =============================================================================
//
// Pure functions from (payer, amount, participants, custom shares) to a
// per-participant share map. Shares are integer minor units and always sum
// to the expense amount.
//

import { LedgerError, LedgerErrorCode } from './errors.js';
import { allocateByWeights, splitEvenly, sumAmounts } from './money.js';
import type { ParticipantId, SplitPolicy, SplitRequest } from './types.js';

function requireCustomShares(request: SplitRequest, policyName: string): ReadonlyMap<ParticipantId, number> {
    const shares = request.customShares;
    if (!shares || shares.size === 0) {
        throw new LedgerError(
            LedgerErrorCode.MissingCustomShares,
            `Custom shares required for ${policyName} split`,
        );
    }
    return shares;
}

/**
 * Everyone in the group, payer included, gets amount / n. The remainder of
 * a non-divisible amount goes one unit at a time to the earliest members.
 */
export class EqualSplitPolicy implements SplitPolicy {
    split({ amount, participantIds }: SplitRequest): Map<ParticipantId, number> {
        if (participantIds.length === 0) {
            throw new LedgerError(LedgerErrorCode.InvalidArgument, 'Cannot split an expense among zero participants');
        }
        const parts = splitEvenly(amount, participantIds.length);
        return new Map(participantIds.map((id, i) => [id, parts[i] ?? 0] as const));
    }
}

export class ExactSplitPolicy implements SplitPolicy {
    split(request: SplitRequest): Map<ParticipantId, number> {
        const shares = requireCustomShares(request, 'exact');

        for (const [id, share] of shares) {
            if (!Number.isInteger(share)) {
                throw new LedgerError(
                    LedgerErrorCode.InvalidArgument,
                    `Exact share for ${id} must be an integer number of minor units`,
                    [{ field: `customShares.${id}`, message: 'Expected integer' }],
                );
            }
        }

        const total = sumAmounts(shares.values(), 'customShares');
        if (total !== request.amount) {
            throw new LedgerError(
                LedgerErrorCode.SplitSumMismatch,
                `Custom split amounts sum to ${total}, expected ${request.amount}`,
            );
        }
        return new Map(shares);
    }
}

export class PercentageSplitPolicy implements SplitPolicy {
    constructor(private readonly tolerance: number = 1e-9) {}

    split(request: SplitRequest): Map<ParticipantId, number> {
        const shares = requireCustomShares(request, 'percentage');

        const totalPercent = sumAmounts(shares.values());
        if (Math.abs(totalPercent - 100) > this.tolerance) {
            throw new LedgerError(
                LedgerErrorCode.PercentageSumMismatch,
                `Percentage splits sum to ${totalPercent}%, expected 100%`,
            );
        }

        const ids = Array.from(shares.keys());
        const parts = allocateByWeights(request.amount, Array.from(shares.values()));
        return new Map(ids.map((id, i) => [id, parts[i] ?? 0] as const));
    }
}
