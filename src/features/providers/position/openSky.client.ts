import round from "lodash/round";
import { RequestTimeoutError } from "../../../lib/errors";
import { buildURL, request, type FetchFn } from "../../../lib/http";
import { createLogger } from "../../../lib/logger";
import { found, notFound, type PositionReport, type ProviderClient, type ProviderResult } from "../providers.types";
import { OpenSkyTokenProvider, type OpenSkyCredentials } from "./openSky.auth";
import { StateVectorSchema, StatesResponseSchema, type StateVector } from "./openSky.schemas";

const log = createLogger("opensky");

export const OPENSKY_BASE_URL = "https://opensky-network.org";

const FEET_PER_METER = 3.28084;
const KNOTS_PER_MPS = 1.94384;
const FPM_PER_MPS = 196.850394;

type OpenSkyOptions = {
    credentials?: OpenSkyCredentials | null;
    baseUrl?: string;
    fetchFn?: FetchFn;
    tokenProvider?: OpenSkyTokenProvider;
};

export const normalizeCallsign = (callsign: unknown): string =>
    typeof callsign === "string" ? callsign.trim().toUpperCase() : "";

export function toPositionReport(s: StateVector): PositionReport {
    const [icao24, callsign, originCountry, timePosition, lastContact, lon, lat, baroAlt, onGround, velocity, track, verticalRate, , geoAlt] = s;
    const altitudeM = baroAlt ?? geoAlt;

    return {
        icao24,
        callsign: normalizeCallsign(callsign),
        originCountry,
        latitude: lat,
        longitude: lon,
        altitudeFt: altitudeM === null ? null : round(altitudeM * FEET_PER_METER),
        speedKt: velocity === null ? null : round(velocity * KNOTS_PER_MPS),
        headingDeg: track === null ? null : round(track),
        verticalRateFpm: verticalRate === null ? null : round(verticalRate * FPM_PER_MPS),
        onGround,
        reportedAt: new Date((timePosition ?? lastContact) * 1000),
    };
}

/**
 * Live position from the OpenSky Network. The flight is matched by callsign
 * against all current state vectors; no match means OpenSky does not see the
 * flight at all, which is reported as not found.
 */
export class OpenSkyPositionClient implements ProviderClient<string, PositionReport> {
    readonly id = "position" as const;
    readonly name = "OpenSky";

    private readonly baseUrl: string;
    private readonly fetchFn?: FetchFn;
    private readonly tokens: OpenSkyTokenProvider | null;

    constructor(options: OpenSkyOptions = {}) {
        this.baseUrl = options.baseUrl ?? OPENSKY_BASE_URL;
        this.fetchFn = options.fetchFn;
        this.tokens =
            options.tokenProvider ??
            (options.credentials ? new OpenSkyTokenProvider(options.credentials, { fetchFn: options.fetchFn }) : null);
    }

    async query(flightNumber: string, timeoutMs: number): Promise<ProviderResult<PositionReport>> {
        const wanted = normalizeCallsign(flightNumber);
        const url = buildURL(this.baseUrl, "/api/states/all");

        // The token fetch and the states request share one deadline.
        const deadline = Date.now() + timeoutMs;
        const token = this.tokens ? await this.tokens.getToken(timeoutMs) : null;
        const remainingMs = deadline - Date.now();
        if (remainingMs <= 0) throw new RequestTimeoutError(url, timeoutMs);

        const res = await request(url, {
            method: "GET",
            token,
            timeoutMs: remainingMs,
            schema: StatesResponseSchema,
            fetchFn: this.fetchFn,
        });

        const states = res.states ?? [];
        const match = states.find((raw) => normalizeCallsign(raw[1]) === wanted);

        if (!match) {
            log.debug(`No state vector among ${states.length} matches ${wanted}`);
            return notFound();
        }

        // A malformed vector for our flight is a bad payload, not a missing flight.
        return found(toPositionReport(StateVectorSchema.parse(match)));
    }
}
