import { errorMessage } from "../../lib/errors";
import { createLogger } from "../../lib/logger";
import { describeUsage } from "../budget/budget.store";
import type { BudgetTracker } from "../budget/budget.types";
import type { DisplayAdapter } from "../display/display.types";
import { isWithinWindow, nextWindowOpening, type OperationalWindow } from "../window/operationalWindow";
import { decide, hadBudget, type DisplayMode } from "./displayMode";
import type { ProviderQueryOrchestrator } from "./tracker.orchestrator";
import type { FlightQuery, FlightStatusSnapshot } from "./tracker.types";

const log = createLogger("poll");

export type TickResult = {
    mode: DisplayMode;
    snapshot: FlightStatusSnapshot;
    windowOk: boolean;
    budgetRemaining: boolean;
};

type PollLoopOptions = {
    query: FlightQuery;
    window: OperationalWindow;
    intervalMs: number;
    orchestrator: ProviderQueryOrchestrator;
    budget: BudgetTracker;
    display: DisplayAdapter;
    clock?: () => Date;
    onTick?: (result: TickResult) => void;
};

/**
 * Drives one tick at a fixed interval. Ticks never overlap: the next one is
 * scheduled `intervalMs` after the previous one started, or immediately if
 * that moment has already passed.
 */
export class PollLoop {
    private readonly options: PollLoopOptions;
    private readonly clock: () => Date;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private running = false;
    private ticks = 0;

    constructor(options: PollLoopOptions) {
        this.options = options;
        this.clock = options.clock ?? (() => new Date());
    }

    get isRunning(): boolean {
        return this.running;
    }

    get tickCount(): number {
        return this.ticks;
    }

    async tick(now: Date = this.clock()): Promise<TickResult> {
        const { query, window, orchestrator, budget, display } = this.options;

        const windowOk = isWithinWindow(window, now);
        const snapshot = await orchestrator.lookup(query, now, { enrich: windowOk });
        const budgetRemaining = hadBudget(snapshot);
        const mode = decide(snapshot, windowOk, budgetRemaining);

        this.ticks++;
        log.info(`${query.flightNumber}: ${mode} (window ${windowOk ? "open" : "closed"}, calls ${formatCalls(snapshot)})`);
        log.info(`Usage: ${describeUsage(budget, now)}`);

        if (!windowOk) {
            const next = nextWindowOpening(window, now);
            log.debug(next ? `Next active window opens ${next.toISOString()}` : "Operational window never opens");
        }

        try {
            await display.render(mode, snapshot);
        } catch (e) {
            log.error(`Display adapter failed: ${errorMessage(e)}`);
        }

        const result = { mode, snapshot, windowOk, budgetRemaining };
        this.options.onTick?.(result);
        return result;
    }

    start(): void {
        if (this.running) return;
        this.running = true;
        log.info(`Tracking ${this.options.query.flightNumber} every ${Math.round(this.options.intervalMs / 1000)}s`);
        void this.runOnce();
    }

    stop(): void {
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    private async runOnce(): Promise<void> {
        this.timer = null;
        if (!this.running) return;

        const startedAt = this.clock();
        try {
            await this.tick(startedAt);
        } catch (e) {
            log.error(`Tick failed: ${errorMessage(e)}`);
        }

        if (!this.running) return;
        const elapsed = this.clock().getTime() - startedAt.getTime();
        const delay = Math.max(0, this.options.intervalMs - elapsed);
        this.timer = setTimeout(() => void this.runOnce(), delay);
    }
}

function formatCalls(snapshot: FlightStatusSnapshot): string {
    return Object.entries(snapshot.calls)
        .map(([id, outcome]) => `${id}=${outcome}`)
        .join(" ");
}
