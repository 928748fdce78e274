import type { ProviderId } from "../providers/providers.types";

export interface BudgetLimit {
    quota: number;
    windowMs: number;
}

/** Counter for one limit. `windowStart` is epoch ms. */
export interface LimitUsage extends BudgetLimit {
    count: number;
    windowStart: number;
}

export type BudgetLimits = Record<ProviderId, readonly BudgetLimit[]>;

export type BudgetUsage = Partial<Record<ProviderId, LimitUsage[]>>;

export interface BudgetTracker {
    /**
     * Takes one call from every limit of `providerId`. Returns false, consuming
     * nothing, if any limit is used up for its current window.
     */
    tryConsume(providerId: ProviderId, now: Date): boolean;
    /** Calls still allowed at `now`; Infinity for an unmetered provider. */
    remaining(providerId: ProviderId, now: Date): number;
    usage(providerId: ProviderId, now: Date): LimitUsage[];
}
