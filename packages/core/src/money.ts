// =============================================================================
// Potluck — Minor-Unit Arithmetic
// =============================================================================
//
// All amounts are integers in the smallest currency unit. Allocation helpers
// always return parts that sum exactly to the total.
// Amounts and running totals stay within Number.MAX_SAFE_INTEGER, where
// integer arithmetic on doubles is exact.
//

import { LedgerError, LedgerErrorCode } from './errors.js';

export function assertSafeAmount(value: number, field: string): void {
    if (Math.abs(value) > Number.MAX_SAFE_INTEGER) {
        throw new LedgerError(
            LedgerErrorCode.InvalidArgument,
            `${field} of ${value} is outside the safe integer range`,
            [{ field, message: 'Exceeds Number.MAX_SAFE_INTEGER' }],
        );
    }
}

export function sumAmounts(values: Iterable<number>, field = 'Total'): number {
    let total = 0;
    for (const value of values) {
        total += value;
        assertSafeAmount(total, field);
    }
    return total;
}

/**
 * Split `total` into `count` near-equal parts. The remainder goes out one
 * unit at a time from the front: splitEvenly(100, 3) → [34, 33, 33].
 */
export function splitEvenly(total: number, count: number): number[] {
    const base = Math.floor(total / count);
    const remainder = total - base * count;
    return Array.from({ length: count }, (_, i) => base + (i < remainder ? 1 : 0));
}

/**
 * Allocate `total` proportionally to `weights` (largest-remainder method).
 * Each part gets the floor of its exact quota; leftover units go to the
 * largest fractional parts, earlier index first on ties.
 */
export function allocateByWeights(total: number, weights: readonly number[]): number[] {
    const weightSum = sumAmounts(weights);
    if (weightSum === 0) return weights.map(() => 0);

    const quotas = weights.map((w) => (total * w) / weightSum);
    const parts = quotas.map((q) => Math.floor(q));
    let leftover = total - sumAmounts(parts);

    const byFraction = quotas
        .map((q, index) => ({ index, fraction: q - Math.floor(q) }))
        .sort((a, b) => b.fraction - a.fraction || a.index - b.index);

    for (const { index } of byFraction) {
        if (leftover <= 0) break;
        parts[index] = (parts[index] ?? 0) + 1;
        leftover--;
    }

    return parts;
}
