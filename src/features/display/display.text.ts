import { DisplayMode } from "../tracker/displayMode";
import type { FlightStatusSnapshot } from "../tracker/tracker.types";
import type { ScheduleInfo, WeatherReport } from "../providers/providers.types";
import type { TimeFormat } from "./display.types";

const pad = (n: number) => String(n).padStart(2, "0");

export function formatClock(d: Date, timeFormat: TimeFormat): string {
    const hours = timeFormat === "12H" ? d.getHours() % 12 || 12 : d.getHours();
    return `${pad(hours)}:${pad(d.getMinutes())}`;
}

/** MM/DD/YY */
export function formatShortDate(d: Date): string {
    return `${pad(d.getMonth() + 1)}/${pad(d.getDate())}/${pad(d.getFullYear() % 100)}`;
}

export function formatRoute(schedule: ScheduleInfo | null): string {
    const origin = schedule?.origin?.code;
    const destination = schedule?.destination?.code;

    if (origin && destination) return `${origin} > ${destination}`;
    if (origin) return `(FROM:${origin})`;
    if (destination) return `(TO:${destination})`;
    return "";
}

export function formatWeather(weather: WeatherReport): string {
    const unit = weather.units === "imperial" ? "F" : "C";
    return `${weather.condition.toUpperCase()} ${weather.temperature}${unit}`;
}

/**
 * One line of text for a character display.
 *
 * With a known route the segments are spaced wide (three blanks) and speed is
 * dropped; without one the clock and speed fill the gap.
 */
export function formatDisplayText(
    mode: DisplayMode,
    snapshot: FlightStatusSnapshot,
    timeFormat: TimeFormat = "24H"
): string {
    const flight = snapshot.query.flightNumber;
    const now = snapshot.takenAt;

    switch (mode) {
        case DisplayMode.NOT_FOUND:
            return `${flight} NOT FOUND`;

        case DisplayMode.OUT_OF_WINDOW_OR_NO_BUDGET:
            return `${formatShortDate(now)}  ${formatClock(now, timeFormat)}  ${flight} STANDBY`;

        case DisplayMode.ACTIVE_TRACKING: {
            const { position, schedule, weather } = snapshot;
            const route = formatRoute(schedule);
            const parts = [position?.callsign || flight];

            if (route) parts.push(route);
            else parts.push(formatClock(now, timeFormat));

            if (position?.altitudeFt != null) parts.push(`${position.altitudeFt}FT`);
            if (!route && position?.speedKt != null) parts.push(`${position.speedKt}KT`);
            if (weather) parts.push(formatWeather(weather));

            return parts.join(route ? "   " : " ");
        }
    }
}
