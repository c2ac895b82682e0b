// =============================================================================
// Potluck — Error Taxonomy
// =============================================================================

export enum LedgerErrorCode {
    UnknownSplitType = 'UnknownSplitType',
    UnknownSettlementPolicy = 'UnknownSettlementPolicy',
    UnknownParticipant = 'UnknownParticipant',
    MissingCustomShares = 'MissingCustomShares',
    SplitSumMismatch = 'SplitSumMismatch',
    PercentageSumMismatch = 'PercentageSumMismatch',
    NoOutstandingBalance = 'NoOutstandingBalance',
    SettlementExceedsBalance = 'SettlementExceedsBalance',
    SettlementPolicyUnsupported = 'SettlementPolicyUnsupported',
    InvalidArgument = 'InvalidArgument',
    RegistrySealed = 'RegistrySealed',
}

export interface LedgerErrorDetail {
    field?: string;
    message: string;
}

/**
 * Thrown for every caller-visible failure. Callers branch on `code`;
 * `details` carries per-field messages for input validation failures.
 */
export class LedgerError extends Error {
    readonly code: LedgerErrorCode;
    readonly details: LedgerErrorDetail[];

    constructor(code: LedgerErrorCode, message: string, details: LedgerErrorDetail[] = []) {
        super(message);
        this.name = 'LedgerError';
        this.code = code;
        this.details = details;
    }
}

export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
    return err instanceof LedgerError && (code === undefined || err.code === code);
}
