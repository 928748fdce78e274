import { describe, it, expect, vi } from "vitest";
import { z, ZodError } from "zod";
import { buildURL, request } from "./http";
import { ApiError, RequestTimeoutError } from "./errors";

const json = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("buildURL", () => {
    it("appends defined params only", () => {
        expect(buildURL("https://api.example.test", "/v1/items", { a: "x y", b: 2, c: undefined })).toBe(
            "https://api.example.test/v1/items?a=x+y&b=2"
        );
    });

    it("resolves relative endpoints against a base path", () => {
        expect(buildURL("https://api.example.test/root/", "items/AAL1")).toBe("https://api.example.test/root/items/AAL1");
    });
});

describe("request", () => {
    const schema = z.object({ ok: z.boolean() });

    it("returns the validated body and sends auth headers", async () => {
        const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(json({ ok: true }));

        const res = await request("https://api.example.test/x", { timeoutMs: 1000, schema, fetchFn, token: "test-token" });

        expect(res).toEqual({ ok: true });
        const init = fetchFn.mock.calls[0][1];
        expect(init?.headers).toEqual({ Accept: "application/json", Authorization: "Bearer test-token" });
    });

    it("throws ApiError with the provider's message on a non-2xx status", async () => {
        const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(json({ message: "quota exceeded" }, 429));

        const err = await request("https://api.example.test/x", { timeoutMs: 1000, schema, fetchFn }).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(ApiError);
        expect(err).toMatchObject({ status: 429, message: "quota exceeded", details: { message: "quota exceeded" } });
    });

    it("falls back to the status code when the body has no message", async () => {
        const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response("", { status: 503 }));

        await expect(request("https://api.example.test/x", { timeoutMs: 1000, schema, fetchFn })).rejects.toThrow("HTTP 503");
    });

    it("rejects a payload that does not match the schema", async () => {
        const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(json({ ok: "yes" }));

        await expect(request("https://api.example.test/x", { timeoutMs: 1000, schema, fetchFn })).rejects.toBeInstanceOf(ZodError);
    });

    it("aborts a call that outlives its timeout", async () => {
        const fetchFn = vi.fn<typeof fetch>(
            (_url, init) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
                })
        );

        await expect(request("https://api.example.test/slow", { timeoutMs: 20, schema, fetchFn })).rejects.toBeInstanceOf(
            RequestTimeoutError
        );
    });
});
