import type {
    PositionReport,
    ProviderClient,
    ProviderId,
    ScheduleInfo,
    ScheduleQuery,
    WeatherLocation,
    WeatherReport,
} from "../providers/providers.types";

export interface FlightQuery {
    /** ICAO callsign form, upper case (e.g. AAL123). */
    readonly flightNumber: string;
    /** Departure date, YYYY-MM-DD. */
    readonly date?: string;
}

/**
 * What happened to one provider during a tick.
 * - ok: called and returned data
 * - notFound: called, provider has no such flight / no data
 * - failed: called, timed out or returned an error or a bad payload
 * - denied: not called, budget exhausted
 * - skipped: not called, not needed this tick
 */
export type CallOutcome = "ok" | "notFound" | "failed" | "denied" | "skipped";

export interface FlightStatusSnapshot {
    query: FlightQuery;
    takenAt: Date;
    flightNotFound: boolean;
    position: PositionReport | null;
    schedule: ScheduleInfo | null;
    weather: WeatherReport | null;
    calls: Record<ProviderId, CallOutcome>;
}

export type PositionClient = ProviderClient<string, PositionReport>;
export type ScheduleClient = ProviderClient<ScheduleQuery, ScheduleInfo>;
export type WeatherClient = ProviderClient<WeatherLocation, WeatherReport>;

export interface TrackerClients {
    position: PositionClient;
    schedule: ScheduleClient;
    weather: WeatherClient;
}

export type ProviderTimeouts = Record<ProviderId, number>;
