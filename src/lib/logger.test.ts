import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger, formatTimestamp, setLogLevel } from "./logger";

describe("logger", () => {
    afterEach(() => setLogLevel("info"));

    it("formats local timestamps", () => {
        expect(formatTimestamp(new Date(2026, 9, 18, 7, 3, 9))).toBe("2026-10-18 07:03:09");
    });

    it("tags lines with level and scope", () => {
        const out = vi.spyOn(console, "warn").mockImplementation(() => undefined);

        createLogger("budget").warn("quota hit");

        expect(String(out.mock.calls[0][0])).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - WARN - budget - quota hit$/);
    });

    it("drops lines below the configured level", () => {
        const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
        const log = createLogger("poll");

        log.debug("hidden");
        setLogLevel("debug");
        log.debug("shown");

        expect(out).toHaveBeenCalledTimes(1);
        expect(String(out.mock.calls[0][0])).toContain(" - DEBUG - poll - shown");
    });

    it("sends errors to stderr", () => {
        const out = vi.spyOn(console, "error").mockImplementation(() => undefined);
        createLogger("main").error("fatal");
        expect(out).toHaveBeenCalledTimes(1);
    });
});
