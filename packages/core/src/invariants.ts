// =============================================================================
// Potluck — Ledger Invariants
// =============================================================================

import { sumAmounts } from './money.js';
import { getBalanceWith, getNetBalance } from './participant.js';
import type { Expense, Participant, ParticipantId, ValidationError, ValidationResult } from './types.js';

export interface LedgerStateView {
    participants: readonly Participant[];
    expenses: readonly Expense[];
    /** Non-zero balance sheet entries as [debtor, creditor, amount] */
    balanceSheetEntries: Iterable<[ParticipantId, ParticipantId, number]>;
}

/**
 * Check every structural invariant of a ledger without throwing:
 *
 * 1. Conservation: net balances across participants sum to zero
 * 2. Balance sheet entries are positive
 * 3. Each expense's splits sum to its amount
 * 4. For every pair, A's balance with B equals what B owes A minus what A
 *    owes B on the balance sheet
 */
export function checkLedgerInvariants(view: LedgerStateView): ValidationResult {
    const errors: ValidationError[] = [];

    // ─── 1. Conservation ───
    const total = sumAmounts(view.participants.map(getNetBalance));
    if (total !== 0) {
        errors.push({ field: 'balances', message: `Net balances sum to ${total}, expected 0` });
    }

    // ─── 2. Non-negative sheet ───
    const owed = new Map<string, number>();
    for (const [debtorId, creditorId, amount] of view.balanceSheetEntries) {
        if (amount <= 0) {
            errors.push({
                field: 'balanceSheet',
                message: `Entry ${debtorId} → ${creditorId} is ${amount}, expected a positive amount`,
            });
        }
        owed.set(`${debtorId}:${creditorId}`, amount);
    }

    // ─── 3. Split sums ───
    for (const expense of view.expenses) {
        const splitTotal = sumAmounts(expense.splits.values());
        if (splitTotal !== expense.amount) {
            errors.push({
                field: `expenses.${expense.id}`,
                message: `Splits sum to ${splitTotal}, expected ${expense.amount}`,
            });
        }
    }

    // ─── 4. Participant balances agree with the sheet ───
    for (const a of view.participants) {
        for (const b of view.participants) {
            if (a.id === b.id) continue;
            const expected = (owed.get(`${b.id}:${a.id}`) ?? 0) - (owed.get(`${a.id}:${b.id}`) ?? 0);
            const actual = getBalanceWith(a, b.id);
            if (actual !== expected) {
                errors.push({
                    field: `participants.${a.id}`,
                    message: `Balance with ${b.id} is ${actual}, balance sheet implies ${expected}`,
                });
            }
        }
    }

    return { valid: errors.length === 0, errors };
}
