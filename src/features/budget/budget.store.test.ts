import { describe, it, expect, vi } from "vitest";
import { BUDGET_STORAGE_KEY, createBudgetTracker, describeUsage } from "./budget.store";
import { memoryStorage } from "./budget.storage";
import type { BudgetLimits } from "./budget.types";

const HOUR = 3_600_000;
const t0 = new Date("2026-10-18T10:00:00Z");
const after = (ms: number) => new Date(t0.getTime() + ms);

const limits = (overrides: Partial<BudgetLimits> = {}): BudgetLimits => ({
    position: [{ quota: 3, windowMs: HOUR }],
    schedule: [],
    weather: [],
    ...overrides,
});

describe("createBudgetTracker", () => {
    it("never allows more than quota calls within one window", () => {
        const budget = createBudgetTracker(limits());

        const granted = Array.from({ length: 10 }, (_, i) => budget.tryConsume("position", after(i * 1000)));

        expect(granted.filter(Boolean)).toHaveLength(3);
        expect(granted.slice(0, 3)).toEqual([true, true, true]);
        expect(budget.remaining("position", after(10_000))).toBe(0);
    });

    it("does not count a denied call", () => {
        const budget = createBudgetTracker(limits({ position: [{ quota: 1, windowMs: HOUR }] }));

        expect(budget.tryConsume("position", t0)).toBe(true);
        expect(budget.tryConsume("position", after(1))).toBe(false);
        expect(budget.tryConsume("position", after(2))).toBe(false);
        expect(budget.usage("position", after(3))[0].count).toBe(1);
    });

    it("resets the window once its duration has elapsed", () => {
        const budget = createBudgetTracker(limits({ position: [{ quota: 2, windowMs: HOUR }] }));

        expect(budget.tryConsume("position", t0)).toBe(true);
        expect(budget.tryConsume("position", after(HOUR - 1))).toBe(true);
        expect(budget.tryConsume("position", after(HOUR - 1))).toBe(false);

        // exactly windowStart + duration starts a new window, at that instant
        expect(budget.tryConsume("position", after(HOUR))).toBe(true);
        expect(budget.usage("position", after(HOUR))[0]).toEqual({
            quota: 2,
            windowMs: HOUR,
            count: 1,
            windowStart: after(HOUR).getTime(),
        });
    });

    it("requires every limit of a provider to have room", () => {
        const budget = createBudgetTracker(
            limits({
                schedule: [
                    { quota: 2, windowMs: HOUR },
                    { quota: 3, windowMs: 24 * HOUR },
                ],
            })
        );

        expect(budget.tryConsume("schedule", t0)).toBe(true);
        expect(budget.tryConsume("schedule", after(1))).toBe(true);
        expect(budget.tryConsume("schedule", after(2))).toBe(false); // hourly spent

        expect(budget.tryConsume("schedule", after(HOUR))).toBe(true); // new hour, daily at 3/3
        expect(budget.tryConsume("schedule", after(HOUR + 1))).toBe(false); // daily spent
        expect(budget.usage("schedule", after(HOUR + 1)).map((u) => u.count)).toEqual([1, 3]);
        expect(budget.remaining("schedule", after(HOUR + 1))).toBe(0);
    });

    it("warns once per exhausted window", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const budget = createBudgetTracker(limits({ position: [{ quota: 1, windowMs: HOUR }] }));

        budget.tryConsume("position", t0);
        budget.tryConsume("position", after(1000));
        budget.tryConsume("position", after(2000));

        expect(warn).toHaveBeenCalledTimes(1);
        expect(String(warn.mock.calls[0][0])).toContain(
            " - WARN - budget - Budget exhausted for position: 1/1 in 3600s window, resets 2026-10-18T11:00:00.000Z"
        );

        budget.tryConsume("position", after(HOUR));
        budget.tryConsume("position", after(HOUR + 1000));

        expect(warn).toHaveBeenCalledTimes(2);
    });

    it("treats a provider without limits as unmetered", () => {
        const budget = createBudgetTracker(limits());

        for (let i = 0; i < 100; i++) expect(budget.tryConsume("weather", t0)).toBe(true);
        expect(budget.remaining("weather", t0)).toBe(Infinity);
        expect(budget.usage("weather", t0)).toEqual([]);
    });

    it("denies everything with a zero quota", () => {
        const budget = createBudgetTracker(limits({ position: [{ quota: 0, windowMs: HOUR }] }));
        expect(budget.tryConsume("position", t0)).toBe(false);
    });

    it("keeps providers independent", () => {
        const budget = createBudgetTracker(
            limits({ position: [{ quota: 1, windowMs: HOUR }], weather: [{ quota: 1, windowMs: HOUR }] })
        );

        expect(budget.tryConsume("position", t0)).toBe(true);
        expect(budget.tryConsume("position", t0)).toBe(false);
        expect(budget.tryConsume("weather", t0)).toBe(true);
    });

    it("remaining() does not start or reset a window", () => {
        const budget = createBudgetTracker(limits({ position: [{ quota: 2, windowMs: HOUR }] }));

        expect(budget.remaining("position", t0)).toBe(2);
        expect(budget.store.getState().usage.position).toBeUndefined();
    });

    it("restores counters from storage", () => {
        const storage = memoryStorage();
        const first = createBudgetTracker(limits(), { storage });
        first.tryConsume("position", t0);
        first.tryConsume("position", after(1));

        const second = createBudgetTracker(limits(), { storage });

        expect(second.remaining("position", after(2))).toBe(1);
        expect(second.tryConsume("position", after(3))).toBe(true);
        expect(second.tryConsume("position", after(4))).toBe(false);
    });

    it("drops persisted counters whose limit changed", () => {
        const storage = memoryStorage();
        const first = createBudgetTracker(limits(), { storage });
        first.tryConsume("position", t0);

        const second = createBudgetTracker(limits({ position: [{ quota: 5, windowMs: HOUR }] }), { storage });

        expect(second.remaining("position", after(1))).toBe(5);
    });

    it("starts from zero when the stored usage is unreadable", () => {
        const storage = memoryStorage({
            [BUDGET_STORAGE_KEY]: JSON.stringify({ state: { usage: { position: "lots" } }, version: 1 }),
        });

        const budget = createBudgetTracker(limits(), { storage });

        expect(budget.remaining("position", t0)).toBe(3);
    });
});

describe("describeUsage", () => {
    it("summarises every provider", () => {
        const budget = createBudgetTracker(limits({ schedule: [{ quota: 10, windowMs: HOUR }] }));
        budget.tryConsume("position", t0);

        expect(describeUsage(budget, t0)).toBe("position=1/3 | schedule=0/10 | weather=unmetered");
    });
});
