// =============================================================================
// Potluck — Balance Projections
// =============================================================================
//
// Read-only views over participant balances. All amounts in minor currency
// units (integers), never floating point.
//

import { getNetBalance } from './participant.js';
import type { Participant, ParticipantId, SuggestedTransfer } from './types.js';

/**
 * Net position of each participant across all counterparties.
 *
 * Positive balance = participant is owed money.
 * Negative balance = participant owes money.
 *
 * Invariant: sum of all balances === 0.
 */
export function computeNetBalances(participants: Iterable<Participant>): Map<ParticipantId, number> {
    const balances = new Map<ParticipantId, number>();
    for (const participant of participants) {
        balances.set(participant.id, getNetBalance(participant));
    }
    return balances;
}

/**
 * Compute a small set of transfers (greedy pairing) that zeroes out all net
 * balances: the largest debtor pays the largest creditor, repeatedly. This
 * needs at most n - 1 transfers but does not promise the fewest possible.
 * Equal amounts keep their insertion order.
 */
export function computeSettlements(balances: ReadonlyMap<ParticipantId, number>): SuggestedTransfer[] {
    const transfers: SuggestedTransfer[] = [];

    // Separate into debtors (negative balance = owes money) and creditors (positive = owed money)
    const debtors: { id: ParticipantId; amount: number }[] = [];
    const creditors: { id: ParticipantId; amount: number }[] = [];

    for (const [id, balance] of balances) {
        if (balance < 0) {
            debtors.push({ id, amount: -balance });
        } else if (balance > 0) {
            creditors.push({ id, amount: balance });
        }
    }

    debtors.sort((a, b) => b.amount - a.amount);
    creditors.sort((a, b) => b.amount - a.amount);

    let di = 0;
    let ci = 0;

    while (di < debtors.length && ci < creditors.length) {
        const debtor = debtors[di];
        const creditor = creditors[ci];
        if (!debtor || !creditor) break;

        const transferAmount = Math.min(debtor.amount, creditor.amount);
        if (transferAmount > 0) {
            transfers.push({ from: debtor.id, to: creditor.id, amount: transferAmount });
        }

        debtor.amount -= transferAmount;
        creditor.amount -= transferAmount;

        if (debtor.amount === 0) di++;
        if (creditor.amount === 0) ci++;
    }

    return transfers;
}
