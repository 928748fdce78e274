export const PROVIDER_IDS = ["position", "schedule", "weather"] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export type ProviderResult<T> =
    | { status: "found"; data: T }
    | { status: "notFound" };

/**
 * One third-party data source. `query` resolves to found/notFound and throws on
 * any other failure (HTTP error, timeout, malformed payload).
 */
export interface ProviderClient<TIdent, TData> {
    readonly id: ProviderId;
    readonly name: string;
    query(ident: TIdent, timeoutMs: number): Promise<ProviderResult<TData>>;
}

export const found = <T>(data: T): ProviderResult<T> => ({ status: "found", data });
export const notFound = <T>(): ProviderResult<T> => ({ status: "notFound" });

export interface PositionReport {
    icao24: string;
    callsign: string;
    originCountry: string;
    latitude: number | null;
    longitude: number | null;
    altitudeFt: number | null;
    speedKt: number | null;
    headingDeg: number | null;
    verticalRateFpm: number | null;
    onGround: boolean;
    reportedAt: Date;
}

export interface AirportRef {
    /** IATA code when known, ICAO otherwise. */
    code: string;
    name: string | null;
    city: string | null;
}

export interface ScheduleInfo {
    ident: string;
    status: string | null;
    origin: AirportRef | null;
    destination: AirportRef | null;
    scheduledDeparture: Date | null;
    estimatedDeparture: Date | null;
    actualDeparture: Date | null;
    scheduledArrival: Date | null;
    estimatedArrival: Date | null;
    actualArrival: Date | null;
    departureGate: string | null;
    departureTerminal: string | null;
    arrivalGate: string | null;
    arrivalTerminal: string | null;
    aircraftType: string | null;
    /** Served from the last successful lookup rather than this tick's call. */
    stale: boolean;
}

export type WeatherUnits = "imperial" | "metric";

export interface WeatherReport {
    condition: string;
    description: string | null;
    temperature: number;
    units: WeatherUnits;
    locationName: string | null;
}

/** Where to ask for weather: the destination city, or a point when no airport is known. */
export type WeatherLocation =
    | { kind: "city"; city: string }
    | { kind: "coordinates"; latitude: number; longitude: number };

export interface ScheduleQuery {
    flightNumber: string;
    date?: string;
    now: Date;
}
