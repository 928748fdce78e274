export interface OperationalWindow {
    /** Minutes after local midnight, inclusive. */
    start: number;
    /** Minutes after local midnight, exclusive. */
    end: number;
    /** Weekday indices, 0 = Sunday. */
    days: readonly number[];
}

const MINUTES_PER_DAY = 24 * 60;

export function minutesOfDay(d: Date): number {
    return d.getHours() * 60 + d.getMinutes();
}

export function wrapsMidnight(window: OperationalWindow): boolean {
    return window.start > window.end;
}

/**
 * True when `now` (local time) falls in [start, end) on an applicable day.
 *
 * A window with start > end wraps midnight. Its after-midnight part belongs to
 * the day the window opened, so a Friday-only 22:00-06:00 window is open on
 * Saturday at 02:00 and closed on Friday at 02:00.
 */
export function isWithinWindow(window: OperationalWindow, now: Date): boolean {
    const minute = minutesOfDay(now);
    const day = now.getDay();
    const isDay = (d: number) => window.days.includes(d);

    if (window.start === window.end) return false;

    if (!wrapsMidnight(window)) {
        return isDay(day) && minute >= window.start && minute < window.end;
    }

    if (minute >= window.start) return isDay(day);
    if (minute < window.end) return isDay((day + 6) % 7);
    return false;
}

/**
 * Next instant at or after `now` when the window opens, or null if it never does.
 * Returns `now` itself while the window is open.
 */
export function nextWindowOpening(window: OperationalWindow, now: Date): Date | null {
    if (window.start === window.end || window.days.length === 0) return null;
    if (isWithinWindow(window, now)) return now;

    const hh = Math.floor(window.start / 60);
    const mm = window.start % 60;

    for (let offset = 0; offset <= 7; offset++) {
        const candidate = new Date(
            now.getFullYear(),
            now.getMonth(),
            now.getDate() + offset,
            hh,
            mm,
            0,
            0
        );
        if (candidate.getTime() > now.getTime() && window.days.includes(candidate.getDay())) {
            return candidate;
        }
    }

    return null;
}

export function describeWindow(window: OperationalWindow): string {
    const fmt = (m: number) => {
        const minute = ((m % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
        return `${String(Math.floor(minute / 60)).padStart(2, "0")}:${String(minute % 60).padStart(2, "0")}`;
    };
    return `${fmt(window.start)}-${fmt(window.end)}`;
}
