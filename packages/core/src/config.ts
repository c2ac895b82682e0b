// =============================================================================
// Potluck — Configuration
// =============================================================================

import { SettlementPolicyKind } from './types.js';
import type { LogLevel } from './logger.js';

export interface LedgerConfig {
    logLevel: LogLevel;
    /** Settlement policy used when createLedger is not given one */
    defaultSettlementPolicy: SettlementPolicyKind;
    /** Allowed drift of a PERCENTAGE split's total away from 100 */
    percentageTolerance: number;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevel {
    return LOG_LEVELS.find((level) => level === value?.toLowerCase()) ?? 'warn';
}

function parseSettlementPolicy(value: string | undefined): SettlementPolicyKind {
    return Object.values(SettlementPolicyKind).find((kind) => kind === value?.toUpperCase())
        ?? SettlementPolicyKind.DirectPairwise;
}

function parseTolerance(value: string | undefined): number {
    const parsed = parseFloat(value ?? '');
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : 1e-9;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): LedgerConfig {
    return {
        logLevel: parseLogLevel(env['POTLUCK_LOG_LEVEL']),
        defaultSettlementPolicy: parseSettlementPolicy(env['POTLUCK_SETTLEMENT_POLICY']),
        percentageTolerance: parseTolerance(env['POTLUCK_PERCENTAGE_TOLERANCE']),
    };
}
