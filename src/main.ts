import { loadConfig, loadCredentials, DEFAULT_CONFIG_FILE } from "./config/config";
import type { Credentials, TrackerConfig } from "./config/config.schemas";
import { ConfigError, errorMessage } from "./lib/errors";
import { createLogger, setLogLevel } from "./lib/logger";
import { createBudgetTracker } from "./features/budget/budget.store";
import { fileStorage } from "./features/budget/budget.storage";
import { ConsoleDisplay } from "./features/display/console.display";
import { OpenSkyPositionClient } from "./features/providers/position/openSky.client";
import { AeroApiScheduleClient } from "./features/providers/schedule/aeroApi.client";
import { OpenWeatherClient } from "./features/providers/weather/openWeather.client";
import { PollLoop } from "./features/tracker/pollLoop";
import { ProviderQueryOrchestrator } from "./features/tracker/tracker.orchestrator";
import { describeWindow } from "./features/window/operationalWindow";

const log = createLogger("main");

function createTracker(config: TrackerConfig, credentials: Credentials): PollLoop {
    const budget = createBudgetTracker(config.budgets, {
        storage: config.usageFile ? fileStorage(config.usageFile) : undefined,
    });

    const orchestrator = new ProviderQueryOrchestrator({
        clients: {
            position: new OpenSkyPositionClient({ credentials: credentials.openSky }),
            schedule: new AeroApiScheduleClient({ apiKey: credentials.aeroApiKey }),
            weather: new OpenWeatherClient({ apiKey: credentials.openWeatherMapKey, units: config.weatherUnits }),
        },
        budget,
        timeoutsMs: {
            position: config.timeoutsSeconds.position * 1000,
            schedule: config.timeoutsSeconds.schedule * 1000,
            weather: config.timeoutsSeconds.weather * 1000,
        },
        scheduleCacheMs: config.scheduleCacheMinutes * 60_000,
    });

    return new PollLoop({
        query: config.flight,
        window: config.window,
        intervalMs: config.pollIntervalSeconds * 1000,
        orchestrator,
        budget,
        display: new ConsoleDisplay(config.display.timeFormat),
    });
}

function main(): void {
    let config: TrackerConfig;
    let credentials: Credentials;
    try {
        config = loadConfig(process.env.TRACKER_CONFIG ?? DEFAULT_CONFIG_FILE);
        credentials = loadCredentials();
    } catch (e) {
        log.error(e instanceof ConfigError ? e.message : `Startup failed: ${errorMessage(e)}`);
        process.exit(1);
    }

    setLogLevel(config.logLevel);
    log.info(
        `Starting flight tracker for ${config.flight.flightNumber}, window ${describeWindow(config.window)}, ` +
            `poll every ${config.pollIntervalSeconds}s`
    );

    const loop = createTracker(config, credentials);

    const shutdown = (signal: string) => {
        log.info(`Received ${signal}, stopping`);
        loop.stop();
        process.exit(0);
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));

    loop.start();
}

main();
