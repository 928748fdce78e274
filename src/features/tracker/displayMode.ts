import type { FlightStatusSnapshot } from "./tracker.types";

export const DisplayMode = {
    NOT_FOUND: "NOT_FOUND",
    OUT_OF_WINDOW_OR_NO_BUDGET: "OUT_OF_WINDOW_OR_NO_BUDGET",
    ACTIVE_TRACKING: "ACTIVE_TRACKING",
} as const;

export type DisplayMode = (typeof DisplayMode)[keyof typeof DisplayMode];

/**
 * True if the budget let at least one provider call through this tick.
 * A call that was made counts whatever its result.
 */
export function hadBudget(snapshot: FlightStatusSnapshot): boolean {
    return Object.values(snapshot.calls).some(
        (outcome) => outcome === "ok" || outcome === "notFound" || outcome === "failed"
    );
}

/**
 * Display mode for one tick. Pure; precedence is not-found, then
 * window/budget, then active tracking.
 */
export function decide(snapshot: FlightStatusSnapshot, windowOk: boolean, budgetRemaining: boolean): DisplayMode {
    if (snapshot.flightNotFound) return DisplayMode.NOT_FOUND;
    if (!windowOk || !budgetRemaining) return DisplayMode.OUT_OF_WINDOW_OR_NO_BUDGET;
    return DisplayMode.ACTIVE_TRACKING;
}
