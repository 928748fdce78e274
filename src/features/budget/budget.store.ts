import { z } from "zod";
import { createStore } from "zustand/vanilla";
import { createJSONStorage, persist, type StateStorage } from "zustand/middleware";
import { createLogger } from "../../lib/logger";
import { PROVIDER_IDS, type ProviderId } from "../providers/providers.types";
import { memoryStorage } from "./budget.storage";
import type { BudgetLimit, BudgetLimits, BudgetTracker, BudgetUsage, LimitUsage } from "./budget.types";

const log = createLogger("budget");

export const BUDGET_STORAGE_KEY = "provider-budget";

type BudgetState = {
    usage: BudgetUsage;
    commit: (providerId: ProviderId, usage: LimitUsage[]) => void;
};

type PersistedBudget = Pick<BudgetState, "usage">;

const LimitUsageSchema = z.object({
    quota: z.number(),
    windowMs: z.number(),
    count: z.number().int().nonnegative(),
    windowStart: z.number(),
});

const PersistedBudgetSchema = z.object({
    usage: z.record(z.string(), z.array(LimitUsageSchema)),
});

type BudgetTrackerOptions = {
    /** Where counters survive a restart. Defaults to process memory only. */
    storage?: StateStorage;
};

/**
 * Keeps only persisted counters whose limit definition still matches the
 * configuration, index by index.
 */
function mergePersisted(persisted: unknown, limits: BudgetLimits): BudgetUsage {
    const parsed = PersistedBudgetSchema.safeParse(persisted);
    if (!parsed.success) {
        if (persisted !== undefined) log.warn("Ignoring unreadable persisted usage, counters start at zero");
        return {};
    }

    const usage: BudgetUsage = {};
    for (const id of PROVIDER_IDS) {
        const saved = parsed.data.usage[id] ?? [];
        const configured = limits[id];
        const matches =
            saved.length === configured.length &&
            saved.every((u, i) => u.quota === configured[i].quota && u.windowMs === configured[i].windowMs);

        if (matches) {
            usage[id] = saved;
        } else if (saved.length) {
            log.info(`Budget limits for ${id} changed, discarding persisted counters`);
        }
    }
    return usage;
}

function freshUsage(limit: BudgetLimit, now: number): LimitUsage {
    return { quota: limit.quota, windowMs: limit.windowMs, count: 0, windowStart: now };
}

/** Applies any window reset due at `now`. Never mutates its input. */
function currentWindows(limits: readonly BudgetLimit[], saved: LimitUsage[] | undefined, now: number): LimitUsage[] {
    return limits.map((limit, i) => {
        const u = saved?.[i];
        if (!u) return freshUsage(limit, now);
        if (now >= u.windowStart + u.windowMs) return freshUsage(limit, now);
        return { ...u };
    });
}

function sameUsage(a: LimitUsage[] | undefined, b: LimitUsage[]): boolean {
    if (!a || a.length !== b.length) return false;
    return a.every((u, i) => u.count === b[i].count && u.windowStart === b[i].windowStart);
}

export function createBudgetStore(limits: BudgetLimits, options: BudgetTrackerOptions = {}) {
    return createStore<BudgetState>()(
        persist(
            (set) => ({
                usage: {},
                commit: (providerId, usage) =>
                    set((state) => ({ usage: { ...state.usage, [providerId]: usage } })),
            }),
            {
                name: BUDGET_STORAGE_KEY,
                version: 1,
                storage: createJSONStorage<PersistedBudget>(() => options.storage ?? memoryStorage()),
                partialize: (state): PersistedBudget => ({ usage: state.usage }),
                merge: (persisted, current) => ({
                    ...current,
                    usage: mergePersisted(persisted, limits),
                }),
                onRehydrateStorage: () => (_state, error) => {
                    if (error) {
                        log.warn(`Could not load persisted usage, counters start at zero: ${String(error)}`);
                    }
                },
            }
        )
    );
}

export type BudgetStore = ReturnType<typeof createBudgetStore>;

/**
 * Client-side call quota per provider, enforced before any network call.
 * Each provider may carry several fixed windows (e.g. hourly, daily, monthly);
 * a call must fit in all of them.
 */
export function createBudgetTracker(
    limits: BudgetLimits,
    options: BudgetTrackerOptions = {}
): BudgetTracker & { store: BudgetStore } {
    const store = createBudgetStore(limits, options);
    // one warning per exhausted window
    const alerted = new Set<string>();

    const view = (providerId: ProviderId, now: Date) =>
        currentWindows(limits[providerId], store.getState().usage[providerId], now.getTime());

    return {
        store,

        tryConsume(providerId, now) {
            if (limits[providerId].length === 0) return true;

            const saved = store.getState().usage[providerId];
            const windows = view(providerId, now);
            const allowed = windows.every((u) => u.count < u.quota);
            const next = allowed ? windows.map((u) => ({ ...u, count: u.count + 1 })) : windows;

            if (!sameUsage(saved, next)) store.getState().commit(providerId, next);

            if (!allowed) {
                const spent = windows.find((u) => u.count >= u.quota);
                if (spent) {
                    const key = `${providerId}:${spent.windowMs}:${spent.windowStart}`;
                    const message =
                        `Budget exhausted for ${providerId}: ${spent.count}/${spent.quota} in ${Math.round(spent.windowMs / 1000)}s window, ` +
                        `resets ${new Date(spent.windowStart + spent.windowMs).toISOString()}`;
                    if (alerted.has(key)) {
                        log.debug(message);
                    } else {
                        alerted.add(key);
                        log.warn(message);
                    }
                }
            }

            return allowed;
        },

        remaining(providerId, now) {
            if (limits[providerId].length === 0) return Infinity;
            return Math.min(...view(providerId, now).map((u) => Math.max(0, u.quota - u.count)));
        },

        usage(providerId, now) {
            return view(providerId, now);
        },
    };
}

export function describeUsage(tracker: BudgetTracker, now: Date): string {
    return PROVIDER_IDS.map((id) => {
        const usage = tracker.usage(id, now);
        if (!usage.length) return `${id}=unmetered`;
        return `${id}=${usage.map((u) => `${u.count}/${u.quota}`).join(",")}`;
    }).join(" | ");
}
