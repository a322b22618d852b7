/**
 * Base class for every failure the sync engine reports per file.
 */
export class LyricsError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The request never got a response (connection refused, DNS, timeout). */
export class TransportError extends LyricsError {
    constructor(public readonly url: string, cause: unknown) {
        super(`Request to ${url} failed: ${describeCause(cause)}`, { cause });
    }
}

/** The service answered with a status other than 2xx or 404. */
export class ServiceError extends LyricsError {
    constructor(public readonly url: string, public readonly status: number) {
        super(`Error getting lrclib item: HTTP ${status} from ${url}`);
    }
}

/**
 * A 2xx response whose body does not have the record shape we expect.
 * Not transient: LRCLIB's API has most likely changed.
 */
export class SchemaError extends LyricsError {
    constructor(public readonly url: string, detail: string) {
        super(`Error parsing lrclib response (did the api schema change?): ${detail}`);
    }
}

/** Reading tags from, or writing an .lrc beside, a local file failed. */
export class LocalIOError extends LyricsError {
    constructor(public readonly path: string, action: string, cause: unknown) {
        super(`${action} failed for ${path}: ${describeCause(cause)}`, { cause });
    }
}

/** Bad command-line or environment input. Fatal before the run starts. */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.message;
    }
    return String(cause);
}
