// =============================================================================
// Potluck — Expenses
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { adjustBalance } from './participant.js';
import type {
    Expense,
    ExpenseId,
    Participant,
    ParticipantId,
    SplitPolicy,
    SplitPolicyKey,
} from './types.js';

export interface CreateExpenseParams {
    payerId: ParticipantId;
    amount: number;
    participantIds: readonly ParticipantId[];
    splitType: SplitPolicyKey;
    splitPolicy: SplitPolicy;
    customShares?: ReadonlyMap<ParticipantId, number>;
    description?: string;
    createdAt?: number;
}

/**
 * Build an expense record. The split is computed here, so any policy error
 * surfaces before the expense exists.
 */
export function createExpense(params: CreateExpenseParams): Expense {
    const splits = params.splitPolicy.split({
        payerId: params.payerId,
        amount: params.amount,
        participantIds: params.participantIds,
        customShares: params.customShares,
    });

    return Object.freeze({
        id: uuidv4() as ExpenseId,
        payerId: params.payerId,
        amount: params.amount,
        splitType: params.splitType,
        splits,
        description: params.description ?? '',
        createdAt: params.createdAt ?? Date.now(),
    });
}

/**
 * Shares owed to the payer: every positive share except the payer's own.
 * The payer's share (present in EQUAL splits) is already paid in cash.
 */
export function owedShares(expense: Expense): [ParticipantId, number][] {
    return Array.from(expense.splits).filter(
        ([participantId, share]) => participantId !== expense.payerId && share > 0,
    );
}

/**
 * Post an expense to the participants' balance maps.
 */
export function applyExpense(expense: Expense, participants: ReadonlyMap<string, Participant>): void {
    const payer = participants.get(expense.payerId);
    if (!payer) {
        throw new RangeError(`Payer ${expense.payerId} is not among the given participants`);
    }

    // Resolve everyone before touching any balance
    const postings = owedShares(expense).map(([participantId, share]) => {
        const participant = participants.get(participantId);
        if (!participant) {
            throw new RangeError(`Participant ${participantId} is not among the given participants`);
        }
        return { participant, share };
    });

    for (const { participant, share } of postings) {
        adjustBalance(participant, payer.id, -share);
        adjustBalance(payer, participant.id, share);
    }
}
