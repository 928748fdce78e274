import type { ZodType, ZodTypeDef } from "zod";
import { ApiError, RequestTimeoutError } from "./errors";

export type FetchFn = typeof fetch;

export type RequestOptions<T> = Omit<RequestInit, "signal" | "headers"> & {
    headers?: Record<string, string>;
    token?: string | null;
    timeoutMs: number;
    schema: ZodType<T, ZodTypeDef, unknown>;
    fetchFn?: FetchFn;
};

export const buildURL = (
    baseURL: string,
    endpoint: string,
    params?: Record<string, string | number | undefined>
): string => {
    const url = new URL(endpoint, baseURL);

    if (params) {
        Object.entries(params).forEach(([key, value]) => {
            if (value !== undefined) url.searchParams.append(key, String(value));
        });
    }

    return url.toString();
};

async function parseJsonSave(res: Response): Promise<unknown> {
    const text = await res.text();

    if (!text) return null;

    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

function messageFrom(data: unknown): string | null {
    if (data && typeof data === "object" && "message" in data && typeof data.message === "string") {
        return data.message;
    }
    if (data && typeof data === "object" && "detail" in data && typeof data.detail === "string") {
        return data.detail;
    }
    return null;
}

/**
 * JSON request bounded by `timeoutMs`. The body is validated against `schema`.
 * Throws `ApiError` on a non-2xx status, `RequestTimeoutError` when the timeout
 * fires, and `ZodError` when the payload does not match.
 */
export async function request<T>(url: string, options: RequestOptions<T>): Promise<T> {
    const { token, timeoutMs, schema, fetchFn = fetch, headers, ...rest } = options;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let res: Response;
    let data: unknown;
    try {
        res = await fetchFn(url, {
            ...rest,
            signal: controller.signal,
            headers: {
                Accept: "application/json",
                ...(token ? { Authorization: `Bearer ${token}` } : {}),
                ...headers,
            },
        });
        data = await parseJsonSave(res);
    } catch (e) {
        if (controller.signal.aborted) throw new RequestTimeoutError(url, timeoutMs);
        throw e;
    } finally {
        clearTimeout(timeout);
    }

    if (!res.ok) {
        throw new ApiError(
            res.status,
            messageFrom(data) || res.statusText || `HTTP ${res.status}`,
            data
        );
    }

    return schema.parse(data);
}
