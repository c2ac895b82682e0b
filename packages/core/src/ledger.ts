// =============================================================================
// Potluck — Ledger (Group Aggregate)
// =============================================================================
//
// Owns the participant set, the expense and settlement history, and the
// authoritative balance sheet. Every mutating call validates fully before it
// changes anything, so a thrown error always leaves the ledger as it was.
//

import { v4 as uuidv4 } from 'uuid';
import { computeNetBalances, computeSettlements } from './balance.js';
import { BalanceSheet } from './balance-sheet.js';
import { loadConfig, type LedgerConfig } from './config.js';
import { LedgerError, LedgerErrorCode } from './errors.js';
import { applyExpense, createExpense, owedShares } from './expense.js';
import { checkLedgerInvariants } from './invariants.js';
import { createLogger, type Logger } from './logger.js';
import { assertSafeAmount, sumAmounts } from './money.js';
import { getBalanceWith } from './participant.js';
import { createPolicyRegistry, defaultPolicyRegistry, type PolicyRegistry } from './policy-registry.js';
import {
    addExpenseInputSchema,
    ledgerNameSchema,
    parseInput,
    settleInputSchema,
    type AddExpenseInput,
    type SettleInput,
} from './schemas.js';
import type {
    Expense,
    LedgerId,
    Participant,
    ParticipantId,
    Passbook,
    SettlementId,
    SettlementPolicy,
    SettlementPolicyKey,
    SettlementRecord,
    SuggestedTransfer,
    ValidationResult,
} from './types.js';

// ─── Types ───

export interface CreateLedgerOptions {
    name: string;
    participants: readonly Participant[];
    /** Fixed for the ledger's lifetime; defaults to config.defaultSettlementPolicy */
    settlementPolicy?: SettlementPolicyKey;
    /** Defaults to the sealed built-in registry */
    registry?: PolicyRegistry;
    config?: Partial<LedgerConfig>;
    logger?: Logger;
}

// ─── Ledger ───

export class Ledger {
    readonly id: LedgerId;
    readonly name: string;
    readonly settlementPolicyKey: SettlementPolicyKey;

    private readonly participants = new Map<string, Participant>();
    private readonly expenses: Expense[] = [];
    private readonly settlements: SettlementRecord[] = [];
    private readonly balanceSheet = new BalanceSheet();
    private readonly settlementPolicy: SettlementPolicy;
    private readonly registry: PolicyRegistry;
    private readonly logger: Logger;

    constructor(options: CreateLedgerOptions) {
        const config = { ...loadConfig(), ...options.config };

        this.id = uuidv4() as LedgerId;
        this.name = parseInput(ledgerNameSchema, options.name, 'ledger name');
        this.logger = options.logger ?? createLogger('Ledger', config.logLevel);
        this.registry = options.registry
            ?? (options.config?.percentageTolerance !== undefined
                ? createPolicyRegistry(config).seal()
                : defaultPolicyRegistry);

        if (options.participants.length === 0) {
            throw new LedgerError(LedgerErrorCode.InvalidArgument, 'A ledger needs at least one participant', [
                { field: 'participants', message: 'Expected at least one participant' },
            ]);
        }
        for (const participant of options.participants) {
            if (this.participants.has(participant.id)) {
                throw new LedgerError(
                    LedgerErrorCode.InvalidArgument,
                    `Participant ${participant.name} (${participant.id}) listed twice`,
                    [{ field: 'participants', message: 'Duplicate participant id' }],
                );
            }
            // Balance maps are reconciled against this ledger's sheet alone
            if (participant.balances.size > 0) {
                throw new LedgerError(
                    LedgerErrorCode.InvalidArgument,
                    `Participant ${participant.name} (${participant.id}) already has balances from another ledger`,
                    [{ field: 'participants', message: 'Expected a participant with no balances' }],
                );
            }
            this.participants.set(participant.id, participant);
        }

        this.settlementPolicyKey = options.settlementPolicy ?? config.defaultSettlementPolicy;
        this.settlementPolicy = this.registry.getSettlementPolicy(this.settlementPolicyKey);
    }

    // ═══════════════════════════════════════════════════════════════════════
    // Mutations
    // ═══════════════════════════════════════════════════════════════════════

    /**
     * Record an expense paid by one participant and split across the group.
     * Every non-payer with a positive share ends up owing the payer that
     * share on the balance sheet, on top of whatever they already owed.
     */
    addExpense(input: AddExpenseInput): Expense {
        return this.guard('expense', () => {
            const { payerId, amount, splitType, customShares, description } = parseInput(
                addExpenseInputSchema,
                input,
                'expense',
            );
            const payer = this.requireParticipant(payerId);
            const splitPolicy = this.registry.getSplitPolicy(splitType);

            const expense = createExpense({
                payerId: payer.id,
                amount,
                participantIds: Array.from(this.participants.values(), (p) => p.id),
                splitType,
                splitPolicy,
                customShares: customShares ? this.resolveShares(customShares) : undefined,
                description,
            });
            this.assertSplitsReconcile(expense);
            this.assertPostingsStaySafe(expense, payer);

            applyExpense(expense, this.participants);
            this.expenses.push(expense);
            for (const [participantId, share] of owedShares(expense)) {
                this.balanceSheet.increment(participantId, payer.id, share);
            }

            this.logger.debug(`Added expense ${expense.id}: ${payer.name} paid ${amount} (${splitType})`);
            return expense;
        });
    }

    /**
     * Record a repayment from `payerId` to `payeeId` through the ledger's
     * settlement policy.
     */
    settle(input: SettleInput): SettlementRecord {
        return this.guard('settlement', () => {
            const { payerId, payeeId, amount } = parseInput(settleInputSchema, input, 'settlement');
            const payer = this.requireParticipant(payerId);
            const payee = this.requireParticipant(payeeId);

            this.settlementPolicy.settle({ payer, payee, amount, balanceSheet: this.balanceSheet });

            const record: SettlementRecord = Object.freeze({
                id: uuidv4() as SettlementId,
                payerId: payer.id,
                payeeId: payee.id,
                amount,
                settledAt: Date.now(),
            });
            this.settlements.push(record);

            this.logger.debug(`Settled ${amount} from ${payer.name} to ${payee.name}`);
            return record;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════
    // Reads
    // ═══════════════════════════════════════════════════════════════════════

    /** Snapshot of debtor → creditor → outstanding amount */
    getPassbook(): Passbook {
        return this.balanceSheet.snapshot();
    }

    /** Outstanding amount `debtorId` owes `creditorId`; zero when none */
    getOutstanding(debtorId: ParticipantId, creditorId: ParticipantId): number {
        return this.balanceSheet.get(debtorId, creditorId);
    }

    getExpenses(): Expense[] {
        return [...this.expenses];
    }

    getSettlements(): SettlementRecord[] {
        return [...this.settlements];
    }

    getParticipants(): Participant[] {
        return Array.from(this.participants.values());
    }

    getParticipant(id: string): Participant | undefined {
        return this.participants.get(id);
    }

    getNetBalances(): Map<ParticipantId, number> {
        return computeNetBalances(this.participants.values());
    }

    /** A small set of transfers (greedy pairing) that clears every net balance in the group */
    suggestSettlements(): SuggestedTransfer[] {
        return computeSettlements(this.getNetBalances());
    }

    checkInvariants(): ValidationResult {
        return checkLedgerInvariants({
            participants: this.getParticipants(),
            expenses: this.expenses,
            balanceSheetEntries: this.balanceSheet.entries(),
        });
    }

    toString(): string {
        return `Ledger(${this.name}, id=${this.id})`;
    }

    // ─── Helpers ───

    private requireParticipant(id: string): Participant {
        const participant = this.participants.get(id);
        if (!participant) {
            throw new LedgerError(
                LedgerErrorCode.UnknownParticipant,
                `Participant ${id} is not a member of ledger ${this.name}`,
            );
        }
        return participant;
    }

    private resolveShares(shares: Record<string, number>): Map<ParticipantId, number> {
        const resolved = new Map<ParticipantId, number>();
        for (const [id, share] of Object.entries(shares)) {
            resolved.set(this.requireParticipant(id).id, share);
        }
        return resolved;
    }

    /** Registered policies are trusted with neither membership nor totals */
    private assertSplitsReconcile(expense: Expense): void {
        for (const participantId of expense.splits.keys()) {
            this.requireParticipant(participantId);
        }
        const total = sumAmounts(expense.splits.values());
        if (total !== expense.amount) {
            throw new LedgerError(
                LedgerErrorCode.SplitSumMismatch,
                `Split policy "${expense.splitType}" produced shares summing to ${total}, expected ${expense.amount}`,
            );
        }
    }

    /** Accumulated debts must stay exact after this expense is posted */
    private assertPostingsStaySafe(expense: Expense, payer: Participant): void {
        for (const [participantId, share] of owedShares(expense)) {
            const participant = this.requireParticipant(participantId);
            assertSafeAmount(this.balanceSheet.get(participantId, payer.id) + share, 'balanceSheet');
            assertSafeAmount(getBalanceWith(participant, payer.id) - share, 'balances');
            assertSafeAmount(getBalanceWith(payer, participantId) + share, 'balances');
        }
    }

    private guard<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            this.logger.warn(`Rejected ${operation}: ${err instanceof Error ? err.message : String(err)}`);
            throw err;
        }
    }
}

export function createLedger(options: CreateLedgerOptions): Ledger {
    return new Ledger(options);
}
