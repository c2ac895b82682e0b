// =============================================================================
// Potluck — Policy Registry
// =============================================================================
//
// Key → implementation tables for split and settlement policies. A registry
// starts out holding the built-in variants; custom policies are registered
// on an instance and the instance is handed to createLedger. The default
// registry is built once at import time and sealed.
//

import { loadConfig, type LedgerConfig } from './config.js';
import { LedgerError, LedgerErrorCode } from './errors.js';
import { DirectPairwiseSettlement, GraphMinimizingSettlement } from './settlement-policies.js';
import { EqualSplitPolicy, ExactSplitPolicy, PercentageSplitPolicy } from './split-policies.js';
import { SettlementPolicyKind, SplitType } from './types.js';
import type { SettlementPolicy, SettlementPolicyKey, SplitPolicy, SplitPolicyKey } from './types.js';

export class PolicyRegistry {
    private readonly splitPolicies = new Map<string, SplitPolicy>();
    private readonly settlementPolicies = new Map<string, SettlementPolicy>();
    private sealed = false;

    registerSplitPolicy(key: SplitPolicyKey, policy: SplitPolicy): this {
        this.assertOpen(key);
        this.splitPolicies.set(key, policy);
        return this;
    }

    registerSettlementPolicy(key: SettlementPolicyKey, policy: SettlementPolicy): this {
        this.assertOpen(key);
        this.settlementPolicies.set(key, policy);
        return this;
    }

    getSplitPolicy(key: SplitPolicyKey): SplitPolicy {
        const policy = this.splitPolicies.get(key);
        if (!policy) {
            throw new LedgerError(LedgerErrorCode.UnknownSplitType, `Invalid split type: ${key}`);
        }
        return policy;
    }

    getSettlementPolicy(key: SettlementPolicyKey): SettlementPolicy {
        const policy = this.settlementPolicies.get(key);
        if (!policy) {
            throw new LedgerError(LedgerErrorCode.UnknownSettlementPolicy, `Unknown settlement policy: ${key}`);
        }
        return policy;
    }

    splitTypes(): string[] {
        return Array.from(this.splitPolicies.keys());
    }

    settlementPolicyKinds(): string[] {
        return Array.from(this.settlementPolicies.keys());
    }

    /** Block further registration */
    seal(): this {
        this.sealed = true;
        return this;
    }

    isSealed(): boolean {
        return this.sealed;
    }

    private assertOpen(key: string): void {
        if (this.sealed) {
            throw new LedgerError(
                LedgerErrorCode.RegistrySealed,
                `Cannot register policy "${key}": registry is sealed`,
            );
        }
    }
}

/**
 * A fresh registry holding the built-in split and settlement policies.
 */
export function createPolicyRegistry(
    config: Pick<LedgerConfig, 'percentageTolerance'> = loadConfig(),
): PolicyRegistry {
    return new PolicyRegistry()
        .registerSplitPolicy(SplitType.Equal, new EqualSplitPolicy())
        .registerSplitPolicy(SplitType.Exact, new ExactSplitPolicy())
        .registerSplitPolicy(SplitType.Percentage, new PercentageSplitPolicy(config.percentageTolerance))
        .registerSettlementPolicy(SettlementPolicyKind.DirectPairwise, new DirectPairwiseSettlement())
        .registerSettlementPolicy(SettlementPolicyKind.GraphMinimizing, new GraphMinimizingSettlement());
}

export const defaultPolicyRegistry: PolicyRegistry = createPolicyRegistry().seal();
