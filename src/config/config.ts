import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigError, errorMessage, formatIssues } from "../lib/errors";
import {
    CredentialsSchema,
    TrackerConfigSchema,
    type Credentials,
    type TrackerConfig,
} from "./config.schemas";

export const DEFAULT_CONFIG_FILE = "tracker.config.json";

export function parseConfig(raw: unknown): TrackerConfig {
    const result = TrackerConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError("Invalid tracker configuration", formatIssues(result.error.issues));
    }
    return Object.freeze(result.data);
}

/**
 * Reads and validates the JSON configuration file.
 * Every failure is a `ConfigError`; callers treat it as fatal.
 */
export function loadConfig(filePath: string = DEFAULT_CONFIG_FILE): TrackerConfig {
    const fullPath = resolve(filePath);

    let text: string;
    try {
        text = readFileSync(fullPath, "utf8");
    } catch (e) {
        throw new ConfigError(`Cannot read configuration file ${fullPath}: ${errorMessage(e)}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (e) {
        throw new ConfigError(`Configuration file ${fullPath} is not valid JSON: ${errorMessage(e)}`);
    }

    return parseConfig(raw);
}

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
    const result = CredentialsSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigError("Missing or invalid provider credentials", formatIssues(result.error.issues));
    }
    return result.data;
}
