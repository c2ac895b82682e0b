// =============================================================================
// Potluck — Settlement Policies
// =============================================================================

import { LedgerError, LedgerErrorCode } from './errors.js';
import { adjustBalance } from './participant.js';
import type { SettlementPolicy, SettlementRequest } from './types.js';

/**
 * Repay part or all of what `payer` owes `payee` on the balance sheet.
 * Only the payer → payee entry is touched; debt in the other direction
 * of the pair is left as it is.
 */
export class DirectPairwiseSettlement implements SettlementPolicy {
    settle({ payer, payee, amount, balanceSheet }: SettlementRequest): void {
        if (!balanceSheet.has(payer.id, payee.id)) {
            throw new LedgerError(
                LedgerErrorCode.NoOutstandingBalance,
                `No outstanding balance from ${payer.name} to ${payee.name}`,
            );
        }

        const outstanding = balanceSheet.get(payer.id, payee.id);
        if (amount > outstanding) {
            throw new LedgerError(
                LedgerErrorCode.SettlementExceedsBalance,
                `Settlement of ${amount} exceeds the outstanding balance of ${outstanding}`,
            );
        }

        balanceSheet.decrement(payer.id, payee.id, amount);
        // payee is owed less by payer, payer owes less to payee
        adjustBalance(payee, payer.id, -amount);
        adjustBalance(payer, payee.id, amount);
    }
}

/**
 * Placeholder for a group-wide transfer-minimizing settlement. It has no
 * pairwise behaviour, so selecting it fails before anything changes; use
 * Ledger.suggestSettlements() for the minimized transfer plan.
 */
export class GraphMinimizingSettlement implements SettlementPolicy {
    settle(_request: SettlementRequest): void {
        throw new LedgerError(
            LedgerErrorCode.SettlementPolicyUnsupported,
            'Graph-minimizing settlement does not record pairwise repayments; use suggestSettlements() instead',
        );
    }
}
