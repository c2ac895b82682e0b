// =============================================================================
// Potluck — Balance Sheet
// =============================================================================
//
// Outstanding debt per ordered pair: debtor → creditor → amount.
// Lookups never create entries, and an entry that reaches zero is removed,
// so "absent" and "zero" are the same state.
//

import type { BalanceSheetAccess, ParticipantId, Passbook } from './types.js';

export class BalanceSheet implements BalanceSheetAccess {
    private readonly rows = new Map<ParticipantId, Map<ParticipantId, number>>();

    get(debtorId: ParticipantId, creditorId: ParticipantId): number {
        return this.rows.get(debtorId)?.get(creditorId) ?? 0;
    }

    has(debtorId: ParticipantId, creditorId: ParticipantId): boolean {
        return this.get(debtorId, creditorId) > 0;
    }

    increment(debtorId: ParticipantId, creditorId: ParticipantId, amount: number): void {
        if (amount === 0) return;
        const row = this.rows.get(debtorId) ?? new Map<ParticipantId, number>();
        row.set(creditorId, (row.get(creditorId) ?? 0) + amount);
        this.rows.set(debtorId, row);
    }

    /**
     * Reduce an outstanding entry. Callers validate the amount first;
     * going below zero is a programming error.
     */
    decrement(debtorId: ParticipantId, creditorId: ParticipantId, amount: number): void {
        const current = this.get(debtorId, creditorId);
        if (amount > current) {
            throw new RangeError(`Balance sheet entry would go negative (${current} - ${amount})`);
        }
        const row = this.rows.get(debtorId);
        if (!row) return;

        const next = current - amount;
        if (next === 0) {
            row.delete(creditorId);
            if (row.size === 0) this.rows.delete(debtorId);
        } else {
            row.set(creditorId, next);
        }
    }

    /** Every non-zero entry, in insertion order */
    *entries(): IterableIterator<[ParticipantId, ParticipantId, number]> {
        for (const [debtorId, row] of this.rows) {
            for (const [creditorId, amount] of row) {
                yield [debtorId, creditorId, amount];
            }
        }
    }

    /** Deep copy; mutating it never reaches the sheet */
    snapshot(): Passbook {
        const copy: Passbook = new Map();
        for (const [debtorId, row] of this.rows) {
            copy.set(debtorId, new Map(row));
        }
        return copy;
    }
}
