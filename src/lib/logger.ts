export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * Local timestamp, `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(d: Date): string {
    return (
        `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
        `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
    );
}

function write(level: LogLevel, scope: string, message: string, args: unknown[]) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

    const line = `${formatTimestamp(new Date())} - ${level.toUpperCase()} - ${scope} - ${message}`;

    switch (level) {
        case "error":
            console.error(line, ...args);
            break;
        case "warn":
            console.warn(line, ...args);
            break;
        default:
            console.log(line, ...args);
    }
}

/**
 * Console logger tagged with the module it belongs to.
 * The level is process-wide (see `setLogLevel`).
 */
export function createLogger(scope: string): Logger {
    return {
        debug: (message, ...args) => write("debug", scope, message, args),
        info: (message, ...args) => write("info", scope, message, args),
        warn: (message, ...args) => write("warn", scope, message, args),
        error: (message, ...args) => write("error", scope, message, args),
    };
}
