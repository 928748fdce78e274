import minBy from "lodash/minBy";
import { buildURL, request, type FetchFn } from "../../../lib/http";
import { isApiError } from "../../../lib/errors";
import { createLogger } from "../../../lib/logger";
import {
    found,
    notFound,
    type AirportRef,
    type ProviderClient,
    type ProviderResult,
    type ScheduleInfo,
    type ScheduleQuery,
} from "../providers.types";
import { AeroFlightsResponseSchema, type AeroAirport, type AeroFlight } from "./aeroApi.schemas";

const log = createLogger("aeroapi");

export const AEROAPI_BASE_URL = "https://aeroapi.flightaware.com/aeroapi/";

type AeroApiOptions = {
    apiKey: string;
    baseUrl?: string;
    fetchFn?: FetchFn;
};

function toAirportRef(a: AeroAirport): AirportRef | null {
    const code = a?.code_iata ?? a?.code_icao ?? a?.code;
    if (!a || !code) return null;
    return { code, name: a.name, city: a.city };
}

const utcDate = (d: Date) => d.toISOString().slice(0, 10);

/** Calendar date of `d` at the airport, YYYY-MM-DD. UTC when the zone is unknown. */
export function airportDate(d: Date, timeZone: string | null): string {
    if (!timeZone) return utcDate(d);
    try {
        return new Intl.DateTimeFormat("en-CA", { timeZone, year: "numeric", month: "2-digit", day: "2-digit" }).format(d);
    } catch (e) {
        log.debug(`Unknown airport time zone ${timeZone}, using UTC: ${String(e)}`);
        return utcDate(d);
    }
}

const departureDate = (f: AeroFlight) =>
    f.scheduled_out ? airportDate(f.scheduled_out, f.origin?.timezone ?? null) : null;

const isAirborne = (f: AeroFlight) =>
    Boolean(f.actual_off ?? f.actual_out) && !(f.actual_on ?? f.actual_in) && !f.cancelled;

/**
 * Picks the leg to show among the ones AeroAPI returns for an ident:
 * the requested departure date (local to the origin airport) if given, else the leg in the air, else the
 * leg scheduled closest to `now`.
 */
export function selectFlight(flights: AeroFlight[], query: ScheduleQuery): AeroFlight | undefined {
    const distance = (f: AeroFlight) =>
        f.scheduled_out ? Math.abs(f.scheduled_out.getTime() - query.now.getTime()) : Infinity;

    if (query.date) {
        const onDate = flights.filter((f) => departureDate(f) === query.date);
        return minBy(onDate, distance);
    }

    return flights.find(isAirborne) ?? minBy(flights, distance);
}

export function toScheduleInfo(f: AeroFlight): ScheduleInfo {
    return {
        ident: f.ident,
        status: f.status,
        origin: toAirportRef(f.origin),
        destination: toAirportRef(f.destination),
        scheduledDeparture: f.scheduled_out,
        estimatedDeparture: f.estimated_out,
        actualDeparture: f.actual_out,
        scheduledArrival: f.scheduled_in,
        estimatedArrival: f.estimated_in,
        actualArrival: f.actual_in,
        departureGate: f.gate_origin,
        departureTerminal: f.terminal_origin,
        arrivalGate: f.gate_destination,
        arrivalTerminal: f.terminal_destination,
        aircraftType: f.aircraft_type,
        stale: false,
    };
}

/**
 * Flight schedule from FlightAware AeroAPI. This is the metered, paid provider.
 */
export class AeroApiScheduleClient implements ProviderClient<ScheduleQuery, ScheduleInfo> {
    readonly id = "schedule" as const;
    readonly name = "AeroAPI";

    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly fetchFn?: FetchFn;

    constructor(options: AeroApiOptions) {
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl ?? AEROAPI_BASE_URL;
        this.fetchFn = options.fetchFn;
    }

    async query(q: ScheduleQuery, timeoutMs: number): Promise<ProviderResult<ScheduleInfo>> {
        const url = buildURL(this.baseUrl, `flights/${encodeURIComponent(q.flightNumber)}`);

        let flights: AeroFlight[];
        try {
            const res = await request(url, {
                method: "GET",
                headers: { "x-apikey": this.apiKey },
                timeoutMs,
                schema: AeroFlightsResponseSchema,
                fetchFn: this.fetchFn,
            });
            flights = res.flights;
        } catch (e) {
            if (isApiError(e) && e.status === 404) return notFound();
            if (isApiError(e) && (e.status === 401 || e.status === 403)) {
                log.error(`AeroAPI rejected the API key (HTTP ${e.status}), check AEROAPI_KEY`);
            }
            throw e;
        }

        const flight = selectFlight(flights, q);
        if (!flight) {
            log.info(`AeroAPI has no leg for ${q.flightNumber}${q.date ? ` on ${q.date}` : ""}`);
            return notFound();
        }

        return found(toScheduleInfo(flight));
    }
}
