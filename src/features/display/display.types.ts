import type { DisplayMode } from "../tracker/displayMode";
import type { FlightStatusSnapshot } from "../tracker/tracker.types";

/**
 * Whatever draws the tick's result. It gets the mode and the snapshot once
 * per tick and owns all layout decisions; absent fields are its to blank out.
 */
export interface DisplayAdapter {
    render(mode: DisplayMode, snapshot: FlightStatusSnapshot): void | Promise<void>;
}

export type TimeFormat = "12H" | "24H";
