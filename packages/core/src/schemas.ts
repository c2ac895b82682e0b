// =============================================================================
// Potluck — Zod Schemas for Runtime Validation
// =============================================================================

import { z } from 'zod';
import { LedgerError, LedgerErrorCode } from './errors.js';

// --- Primitive schemas ------------------------------------------------------

const idSchema = z.string().min(1, 'Missing id');

export const participantNameSchema = z.string().trim().min(1).max(100);

export const ledgerNameSchema = z.string().trim().min(1).max(200);

/** Amounts are integer minor units */
export const amountSchema = z
    .number()
    .int('Amount must be an integer number of minor units')
    .positive('Amount must be positive')
    .safe('Amount must not exceed Number.MAX_SAFE_INTEGER');

export const descriptionSchema = z.string().max(500);

/** An exact amount (EXACT) or a percentage (PERCENTAGE) */
const shareValueSchema = z.number().finite().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const customSharesSchema = z.record(idSchema, shareValueSchema);

// --- Operation inputs -------------------------------------------------------

export const addExpenseInputSchema = z.object({
    payerId: idSchema,
    amount: amountSchema,
    splitType: z.string().min(1, 'Missing split type'),
    customShares: customSharesSchema.optional(),
    description: descriptionSchema.default(''),
});

export const settleInputSchema = z.object({
    payerId: idSchema,
    payeeId: idSchema,
    amount: amountSchema,
});

export type AddExpenseInput = z.input<typeof addExpenseInputSchema>;
export type SettleInput = z.input<typeof settleInputSchema>;

/**
 * Parse a value, turning a ZodError into an InvalidArgument LedgerError
 * with one detail per issue.
 */
export function parseInput<S extends z.ZodTypeAny>(
    schema: S,
    value: unknown,
    context: string,
): z.output<S> {
    const result = schema.safeParse(value);
    if (result.success) {
        return result.data;
    }
    const details = result.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join('.') : undefined,
        message: issue.message,
    }));
    throw new LedgerError(
        LedgerErrorCode.InvalidArgument,
        `Invalid ${context}: ${details.map((d) => (d.field ? `${d.field}: ${d.message}` : d.message)).join(', ')}`,
        details,
    );
}
