import { vi } from "vitest";
import { found, type PositionReport, type ScheduleInfo, type WeatherReport } from "../providers/providers.types";
import type { PositionClient, ScheduleClient, WeatherClient } from "./tracker.types";

export const positionReport: PositionReport = {
    icao24: "a1b2c3",
    callsign: "AAL123",
    originCountry: "United States",
    latitude: 40.9,
    longitude: -73.5,
    altitudeFt: 35000,
    speedKt: 450,
    headingDeg: 271,
    verticalRateFpm: 0,
    onGround: false,
    reportedAt: new Date("2026-10-16T16:00:00Z"),
};

export const scheduleInfo: ScheduleInfo = {
    ident: "AAL123",
    status: "En Route / On Time",
    origin: { code: "JFK", name: "John F Kennedy Intl", city: "New York" },
    destination: { code: "LAX", name: "Los Angeles Intl", city: "Los Angeles" },
    scheduledDeparture: new Date("2026-10-16T14:00:00Z"),
    estimatedDeparture: new Date("2026-10-16T14:10:00Z"),
    actualDeparture: new Date("2026-10-16T14:12:00Z"),
    scheduledArrival: new Date("2026-10-16T20:00:00Z"),
    estimatedArrival: new Date("2026-10-16T20:05:00Z"),
    actualArrival: null,
    departureGate: "B22",
    departureTerminal: "8",
    arrivalGate: "41",
    arrivalTerminal: "4",
    aircraftType: "A321",
    stale: false,
};

export const weatherReport: WeatherReport = {
    condition: "Clouds",
    description: "broken clouds",
    temperature: 72,
    units: "imperial",
    locationName: "Los Angeles",
};

/**
 * Provider clients that answer instantly with the fixtures above.
 * Override a `query` mock per test to script failures.
 */
export function fakeClients() {
    const position = {
        id: "position" as const,
        name: "FakePosition",
        query: vi.fn<PositionClient["query"]>().mockResolvedValue(found(positionReport)),
    };
    const schedule = {
        id: "schedule" as const,
        name: "FakeSchedule",
        query: vi.fn<ScheduleClient["query"]>().mockResolvedValue(found(scheduleInfo)),
    };
    const weather = {
        id: "weather" as const,
        name: "FakeWeather",
        query: vi.fn<WeatherClient["query"]>().mockResolvedValue(found(weatherReport)),
    };
    return { position, schedule, weather };
}
