import { request, type FetchFn } from "../../../lib/http";
import { createLogger } from "../../../lib/logger";
import { TokenResponseSchema } from "./openSky.schemas";

const log = createLogger("opensky");

export const OPENSKY_TOKEN_URL =
    "https://auth.opensky-network.org/auth/realms/opensky-network/protocol/openid-connect/token";

/** Tokens are renewed this long before they expire. */
const EXPIRY_MARGIN_MS = 60_000;

export type OpenSkyCredentials = {
    clientId: string;
    clientSecret: string;
};

type TokenOptions = {
    fetchFn?: FetchFn;
    tokenUrl?: string;
    clock?: () => number;
};

/**
 * OAuth2 client-credentials token, fetched lazily and reused until shortly
 * before it expires.
 */
export class OpenSkyTokenProvider {
    private token: string | null = null;
    private expiresAt = 0;
    private readonly fetchFn?: FetchFn;
    private readonly tokenUrl: string;
    private readonly clock: () => number;

    constructor(
        private readonly credentials: OpenSkyCredentials,
        options: TokenOptions = {}
    ) {
        this.fetchFn = options.fetchFn;
        this.tokenUrl = options.tokenUrl ?? OPENSKY_TOKEN_URL;
        this.clock = options.clock ?? Date.now;
    }

    async getToken(timeoutMs: number): Promise<string> {
        const now = this.clock();
        if (this.token && this.expiresAt > now + EXPIRY_MARGIN_MS) return this.token;

        this.token = null;
        const body = new URLSearchParams({
            grant_type: "client_credentials",
            client_id: this.credentials.clientId,
            client_secret: this.credentials.clientSecret,
        });

        const res = await request(this.tokenUrl, {
            method: "POST",
            body: body.toString(),
            headers: { "Content-Type": "application/x-www-form-urlencoded" },
            timeoutMs,
            schema: TokenResponseSchema,
            fetchFn: this.fetchFn,
        });

        this.token = res.access_token;
        this.expiresAt = now + res.expires_in * 1000;
        log.info("Refreshed OpenSky access token");
        return this.token;
    }
}
