import { createLogger } from "../../lib/logger";
import type { DisplayMode } from "../tracker/displayMode";
import type { FlightStatusSnapshot } from "../tracker/tracker.types";
import { formatDisplayText } from "./display.text";
import type { DisplayAdapter, TimeFormat } from "./display.types";

const log = createLogger("display");

/**
 * Stand-in for the LED matrix: prints the line the matrix would show.
 */
export class ConsoleDisplay implements DisplayAdapter {
    private lastText: string | null = null;

    constructor(private readonly timeFormat: TimeFormat = "24H") {}

    get text(): string | null {
        return this.lastText;
    }

    render(mode: DisplayMode, snapshot: FlightStatusSnapshot): void {
        this.lastText = formatDisplayText(mode, snapshot, this.timeFormat);
        log.info(`DISPLAY TEXT: ${this.lastText}`);
    }
}
