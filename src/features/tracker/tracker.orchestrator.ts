import { errorMessage } from "../../lib/errors";
import { createLogger } from "../../lib/logger";
import type { BudgetTracker } from "../budget/budget.types";
import type { ProviderClient, ProviderId, ScheduleInfo, WeatherLocation } from "../providers/providers.types";
import type {
    CallOutcome,
    FlightQuery,
    FlightStatusSnapshot,
    ProviderTimeouts,
    TrackerClients,
} from "./tracker.types";

const log = createLogger("orchestrator");

type OrchestratorOptions = {
    clients: TrackerClients;
    budget: BudgetTracker;
    timeoutsMs: ProviderTimeouts;
    /** How long a successful schedule may stand in for a denied or failed call. 0 disables. */
    scheduleCacheMs: number;
};

type LookupOptions = {
    /** Query schedule and weather as well as position. Off outside the operational window. */
    enrich?: boolean;
};

type CallResult<T> = { outcome: CallOutcome; data: T | null };

type CachedSchedule = { flightNumber: string; info: ScheduleInfo; fetchedAt: number };

export function emptySnapshot(query: FlightQuery, now: Date): FlightStatusSnapshot {
    return {
        query,
        takenAt: now,
        flightNotFound: false,
        position: null,
        schedule: null,
        weather: null,
        calls: { position: "skipped", schedule: "skipped", weather: "skipped" },
    };
}

/**
 * Weather is wanted at the destination airport. The aircraft's own position
 * stands in only while the schedule names no destination city.
 */
export function weatherLocation(snapshot: FlightStatusSnapshot): WeatherLocation | null {
    const city = snapshot.schedule?.destination?.city;
    if (city) return { kind: "city", city };

    const p = snapshot.position;
    if (p && p.latitude !== null && p.longitude !== null) {
        return { kind: "coordinates", latitude: p.latitude, longitude: p.longitude };
    }
    return null;
}

/**
 * Queries position, schedule and weather for one tick and merges whatever
 * succeeded into a fresh snapshot. Each provider is asked for budget first,
 * called at most once, and fills only its own fields. No provider failure
 * escapes `lookup`.
 */
export class ProviderQueryOrchestrator {
    private readonly clients: TrackerClients;
    private readonly budget: BudgetTracker;
    private readonly timeoutsMs: ProviderTimeouts;
    private readonly scheduleCacheMs: number;
    private lastSchedule: CachedSchedule | null = null;

    constructor(options: OrchestratorOptions) {
        this.clients = options.clients;
        this.budget = options.budget;
        this.timeoutsMs = options.timeoutsMs;
        this.scheduleCacheMs = options.scheduleCacheMs;
    }

    async lookup(query: FlightQuery, now: Date, options: LookupOptions = {}): Promise<FlightStatusSnapshot> {
        const { enrich = true } = options;
        const snapshot = emptySnapshot(query, now);

        const position = await this.call(this.clients.position, query.flightNumber, now);
        snapshot.calls.position = position.outcome;
        snapshot.position = position.data;

        if (position.outcome === "notFound") {
            log.info(`${this.clients.position.name} does not know flight ${query.flightNumber}`);
            this.lastSchedule = null;
            snapshot.flightNotFound = true;
            return snapshot;
        }

        if (!enrich) return snapshot;

        const schedule = await this.call(
            this.clients.schedule,
            { flightNumber: query.flightNumber, date: query.date, now },
            now
        );
        snapshot.calls.schedule = schedule.outcome;
        snapshot.schedule = this.resolveSchedule(query, schedule, now);

        const location = weatherLocation(snapshot);
        if (location) {
            const weather = await this.call(this.clients.weather, location, now);
            snapshot.calls.weather = weather.outcome;
            snapshot.weather = weather.data;
        } else {
            log.debug("Neither destination nor aircraft position known this tick, skipping weather");
        }

        return snapshot;
    }

    private resolveSchedule(query: FlightQuery, result: CallResult<ScheduleInfo>, now: Date): ScheduleInfo | null {
        if (result.data) {
            this.lastSchedule = { flightNumber: query.flightNumber, info: result.data, fetchedAt: now.getTime() };
            return result.data;
        }

        if (result.outcome === "notFound") {
            this.lastSchedule = null;
            return null;
        }

        const cached = this.lastSchedule;
        if (
            cached &&
            cached.flightNumber === query.flightNumber &&
            now.getTime() - cached.fetchedAt <= this.scheduleCacheMs
        ) {
            log.debug(`Using schedule from ${new Date(cached.fetchedAt).toISOString()} (${result.outcome})`);
            return { ...cached.info, stale: true };
        }

        return null;
    }

    private async call<TIdent, TData>(
        client: ProviderClient<TIdent, TData>,
        ident: TIdent,
        now: Date
    ): Promise<CallResult<TData>> {
        if (!this.budget.tryConsume(client.id, now)) {
            log.debug(`${client.name}: no budget left, not calling`);
            return { outcome: "denied", data: null };
        }

        try {
            const result = await client.query(ident, this.timeoutFor(client.id));
            if (result.status === "found") return { outcome: "ok", data: result.data };
            return { outcome: "notFound", data: null };
        } catch (e) {
            log.warn(`${client.name} lookup failed, retrying next tick: ${errorMessage(e)}`);
            return { outcome: "failed", data: null };
        }
    }

    private timeoutFor(id: ProviderId): number {
        return this.timeoutsMs[id];
    }
}
