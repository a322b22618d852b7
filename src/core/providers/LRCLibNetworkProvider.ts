import { Logger } from "../utils/Logger";
import { LyricsClient } from "../interfaces/LyricsClient";
import { LyricsCandidate } from "../interfaces/LyricsCandidate";
import { LookupQuery } from "../interfaces/LookupQuery";
import { toGetParams, toSearchParams } from "../utils/QueryBuilder";
import { SchemaError, ServiceError, TransportError } from "../errors/LyricsErrors";
import { DEFAULT_LRCLIB_URL, DEFAULT_REQUEST_TIMEOUT_MS, LRCLIB_CLIENT_HEADER } from "../constants";

export interface LRCLibOptions {
    baseUrl?: string;
    requestTimeoutMs?: number;
}

type Body = { found: false } | { found: true; value: unknown };

/**
 * Client for the LRCLIB HTTP API.
 * 404 resolves to `null`; other failures reject with a `LyricsError`.
 */
export class LRCLibNetworkProvider implements LyricsClient {
    private readonly baseUrl: string;
    private readonly requestTimeoutMs: number;

    constructor(options: LRCLibOptions = {}) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_LRCLIB_URL).replace(/\/+$/, "");
        this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    }

    public async exactGet(query: LookupQuery): Promise<LyricsCandidate | null> {
        const url = this.buildUrl("/api/get", toGetParams(query));
        const body = await this.request(url);
        if (!body.found) {
            return null;
        }
        return parseCandidate(body.value, url);
    }

    public async fuzzySearch(query: LookupQuery): Promise<LyricsCandidate[] | null> {
        const url = this.buildUrl("/api/search", toSearchParams(query));
        const body = await this.request(url);
        if (!body.found) {
            return null;
        }
        if (!Array.isArray(body.value)) {
            throw new SchemaError(url, "expected an array of records");
        }
        return body.value.map((item, index) => parseCandidate(item, url, `[${index}]`));
    }

    private buildUrl(path: string, params: [string, string][]): string {
        const url = new URL(`${this.baseUrl}${path}`);
        for (const [key, value] of params) {
            url.searchParams.append(key, value);
        }
        return url.toString();
    }

    private async request(url: string): Promise<Body> {
        Logger.debug(`[LRCLIB] GET ${url}`);

        let response: Response;
        let text: string;
        try {
            response = await fetch(url, {
                headers: {
                    "Lrclib-Client": LRCLIB_CLIENT_HEADER,
                    "User-Agent": LRCLIB_CLIENT_HEADER,
                },
                signal: AbortSignal.timeout(this.requestTimeoutMs),
            });
            text = await response.text();
        } catch (error) {
            throw new TransportError(url, error);
        }

        if (response.status === 404) {
            return { found: false };
        }
        if (!response.ok) {
            throw new ServiceError(url, response.status);
        }

        try {
            return { found: true, value: JSON.parse(text) };
        } catch (error) {
            throw new SchemaError(url, error instanceof Error ? error.message : "invalid JSON");
        }
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates one record of the `get`/`search` response.
 * `plainLyrics` and `syncedLyrics` may be null or missing.
 */
export function parseCandidate(value: unknown, url: string, at = ""): LyricsCandidate {
    const field = (name: string) => (at ? `${at}.${name}` : name);

    if (!isRecord(value)) {
        throw new SchemaError(url, `${at || "body"} is not an object`);
    }

    const { id, trackName, artistName, albumName, duration, instrumental } = value;

    if (typeof id !== "number" || !Number.isInteger(id) || id < 0) {
        throw new SchemaError(url, `${field("id")} must be an unsigned integer`);
    }
    if (typeof trackName !== "string") {
        throw new SchemaError(url, `${field("trackName")} must be a string`);
    }
    if (typeof artistName !== "string") {
        throw new SchemaError(url, `${field("artistName")} must be a string`);
    }
    if (typeof albumName !== "string") {
        throw new SchemaError(url, `${field("albumName")} must be a string`);
    }
    if (typeof duration !== "number") {
        throw new SchemaError(url, `${field("duration")} must be a number`);
    }
    if (typeof instrumental !== "boolean") {
        throw new SchemaError(url, `${field("instrumental")} must be a boolean`);
    }

    const plainLyrics = optionalString(value.plainLyrics, url, field("plainLyrics"));
    const syncedLyrics = optionalString(value.syncedLyrics, url, field("syncedLyrics"));

    return {
        id,
        trackName,
        artistName,
        albumName,
        duration,
        instrumental,
        ...(plainLyrics !== undefined ? { plainLyrics } : {}),
        ...(syncedLyrics !== undefined ? { syncedLyrics } : {}),
    };
}

function optionalString(value: unknown, url: string, field: string): string | undefined {
    if (value === null || value === undefined) {
        return undefined;
    }
    if (typeof value !== "string") {
        throw new SchemaError(url, `${field} must be a string or null`);
    }
    return value;
}
