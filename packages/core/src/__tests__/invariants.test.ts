// =============================================================================
// Ledger Invariant Checker Tests
// =============================================================================

import { describe, it, expect } from 'vitest';
import { checkLedgerInvariants } from '../invariants.js';
import { adjustBalance, createParticipant } from '../participant.js';
import type { Expense, ExpenseId, ParticipantId } from '../types.js';

function makeExpense(payerId: ParticipantId, amount: number, splits: [ParticipantId, number][]): Expense {
    return {
        id: 'expense-1' as ExpenseId,
        payerId,
        amount,
        splitType: 'EXACT',
        splits: new Map(splits),
        description: '',
        createdAt: 1000,
    };
}

describe('checkLedgerInvariants', () => {
    it('accepts a consistent ledger', () => {
        const alice = createParticipant('Alice');
        const bob = createParticipant('Bob');
        adjustBalance(bob, alice.id, -60);
        adjustBalance(alice, bob.id, 60);

        const result = checkLedgerInvariants({
            participants: [alice, bob],
            expenses: [makeExpense(alice.id, 100, [[alice.id, 40], [bob.id, 60]])],
            balanceSheetEntries: [[bob.id, alice.id, 60]],
        });
        expect(result).toEqual({ valid: true, errors: [] });
    });

    it('flags broken conservation and sheet disagreement', () => {
        const alice = createParticipant('Alice');
        const bob = createParticipant('Bob');
        adjustBalance(alice, bob.id, 60);

        const result = checkLedgerInvariants({
            participants: [alice, bob],
            expenses: [],
            balanceSheetEntries: [[bob.id, alice.id, 60]],
        });
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
            { field: 'balances', message: 'Net balances sum to 60, expected 0' },
            {
                field: `participants.${bob.id}`,
                message: `Balance with ${alice.id} is 0, balance sheet implies -60`,
            },
        ]);
    });

    it('flags non-positive sheet entries and unbalanced splits', () => {
        const alice = createParticipant('Alice');
        const bob = createParticipant('Bob');

        const result = checkLedgerInvariants({
            participants: [alice, bob],
            expenses: [makeExpense(alice.id, 100, [[alice.id, 50], [bob.id, 40]])],
            balanceSheetEntries: [[bob.id, alice.id, -5]],
        });
        expect(result.errors.map((e) => e.field)).toEqual([
            'balanceSheet',
            'expenses.expense-1',
            `participants.${alice.id}`,
            `participants.${bob.id}`,
        ]);
    });
});
