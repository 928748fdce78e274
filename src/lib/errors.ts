import type { ZodIssue } from "zod";

/**
 * Non-2xx response from a provider. `details` holds the parsed body (JSON or text).
 */
export class ApiError extends Error {
    readonly status: number;
    readonly details: unknown;

    constructor(status: number, message: string, details: unknown) {
        super(message);
        this.name = "ApiError";
        this.status = status;
        this.details = details;
    }
}

export class RequestTimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(url: string, timeoutMs: number) {
        super(`Request to ${url} timed out after ${timeoutMs}ms`);
        this.name = "RequestTimeoutError";
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Startup configuration or credential problem. Fatal: no tick begins.
 */
export class ConfigError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length ? `${message}\n  - ${issues.join("\n  - ")}` : message);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

export function formatIssues(issues: ZodIssue[]): string[] {
    return issues.map((issue) => {
        const path = issue.path.length ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
    });
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export function isApiError(e: unknown): e is ApiError {
    return e instanceof ApiError;
}
