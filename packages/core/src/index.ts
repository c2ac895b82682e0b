// =============================================================================
// Potluck — Core Public API
// =============================================================================

// Types
export type {
    BalanceSheetAccess,
    Expense,
    ExpenseId,
    LedgerId,
    Participant,
    ParticipantId,
    Passbook,
    SettlementId,
    SettlementPolicy,
    SettlementPolicyKey,
    SettlementRecord,
    SettlementRequest,
    SplitPolicy,
    SplitPolicyKey,
    SplitRequest,
    SuggestedTransfer,
    ValidationError,
    ValidationResult,
} from './types.js';

export { SettlementPolicyKind, SplitType } from './types.js';

// Errors
export { LedgerError, LedgerErrorCode, isLedgerError } from './errors.js';
export type { LedgerErrorDetail } from './errors.js';

// Config & logging
export { loadConfig } from './config.js';
export type { LedgerConfig } from './config.js';
export { createLogger } from './logger.js';
export type { ConsoleSink, LogLevel, Logger } from './logger.js';

// Participants
export {
    createParticipant,
    generateParticipantId,
    getBalanceWith,
    getNetBalance,
} from './participant.js';

// Policies
export { EqualSplitPolicy, ExactSplitPolicy, PercentageSplitPolicy } from './split-policies.js';
export { DirectPairwiseSettlement, GraphMinimizingSettlement } from './settlement-policies.js';
export { PolicyRegistry, createPolicyRegistry, defaultPolicyRegistry } from './policy-registry.js';

// Expenses
export { createExpense, owedShares } from './expense.js';
export type { CreateExpenseParams } from './expense.js';

// Projections
export { computeNetBalances, computeSettlements } from './balance.js';
export { checkLedgerInvariants } from './invariants.js';
export type { LedgerStateView } from './invariants.js';

// Money
export { allocateByWeights, splitEvenly, sumAmounts } from './money.js';

// Schemas
export {
    addExpenseInputSchema,
    amountSchema,
    customSharesSchema,
    descriptionSchema,
    ledgerNameSchema,
    parseInput,
    participantNameSchema,
    settleInputSchema,
} from './schemas.js';
export type { AddExpenseInput, SettleInput } from './schemas.js';

// Ledger
export { Ledger, createLedger } from './ledger.js';
export type { CreateLedgerOptions } from './ledger.js';
