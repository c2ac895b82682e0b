// =============================================================================
// Potluck — Core Type Definitions
// =============================================================================

// --- Branded Primitive Types ------------------------------------------------

/** UUID v4 identifying a participant */
export type ParticipantId = string & { readonly __brand: 'ParticipantId' };

/** UUID v4 identifying a ledger (group) */
export type LedgerId = string & { readonly __brand: 'LedgerId' };

/** UUID v4 identifying an expense */
export type ExpenseId = string & { readonly __brand: 'ExpenseId' };

/** UUID v4 identifying a recorded settlement */
export type SettlementId = string & { readonly __brand: 'SettlementId' };

// --- Policy Keys ------------------------------------------------------------

export enum SplitType {
    Equal = 'EQUAL',
    Exact = 'EXACT',
    Percentage = 'PERCENTAGE',
}

export enum SettlementPolicyKind {
    DirectPairwise = 'DIRECT_PAIRWISE',
    GraphMinimizing = 'GRAPH_MINIMIZING',
}

/** Built-in keys plus anything registered on a custom registry */
export type SplitPolicyKey = SplitType | (string & {});
export type SettlementPolicyKey = SettlementPolicyKind | (string & {});

// --- Participant ------------------------------------------------------------

export interface Participant {
    readonly id: ParticipantId;
    readonly name: string;
    /**
     * Running balance per counterparty, in minor units.
     * Positive = this participant is owed by the counterparty,
     * negative = this participant owes the counterparty.
     * Zero entries are never stored.
     */
    readonly balances: Map<ParticipantId, number>;
}

// --- Expense ----------------------------------------------------------------

export interface Expense {
    readonly id: ExpenseId;
    readonly payerId: ParticipantId;
    /** Amount in smallest currency unit (e.g., cents) to avoid floating point */
    readonly amount: number;
    readonly splitType: SplitPolicyKey;
    /** Participant → share in minor units (sums to amount) */
    readonly splits: ReadonlyMap<ParticipantId, number>;
    readonly description: string;
    readonly createdAt: number; // Unix ms
}

export interface SettlementRecord {
    readonly id: SettlementId;
    readonly payerId: ParticipantId;
    readonly payeeId: ParticipantId;
    readonly amount: number;
    readonly settledAt: number; // Unix ms
}

/** Debtor → creditor → outstanding amount, detached from the ledger */
export type Passbook = Map<ParticipantId, Map<ParticipantId, number>>;

// --- Policy Contracts -------------------------------------------------------

export interface SplitRequest {
    payerId: ParticipantId;
    amount: number;
    /** Every participant of the ledger, in insertion order */
    participantIds: readonly ParticipantId[];
    /** Amounts (EXACT) or percentages (PERCENTAGE), keyed by participant */
    customShares?: ReadonlyMap<ParticipantId, number>;
}

export interface SplitPolicy {
    split(request: SplitRequest): Map<ParticipantId, number>;
}

/** The view of the balance sheet a settlement policy works against */
export interface BalanceSheetAccess {
    get(debtorId: ParticipantId, creditorId: ParticipantId): number;
    has(debtorId: ParticipantId, creditorId: ParticipantId): boolean;
    decrement(debtorId: ParticipantId, creditorId: ParticipantId, amount: number): void;
}

export interface SettlementRequest {
    payer: Participant;
    payee: Participant;
    amount: number;
    balanceSheet: BalanceSheetAccess;
}

export interface SettlementPolicy {
    settle(request: SettlementRequest): void;
}

// --- Balance Projections ----------------------------------------------------

export interface SuggestedTransfer {
    from: ParticipantId;
    to: ParticipantId;
    amount: number;
}

// --- Validation Result ------------------------------------------------------

export interface ValidationError {
    field?: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}
