import { parseArgs } from "node:util";
import { SuppressionFlags } from "../interfaces/LookupQuery";
import { parseIgnoreFields } from "../utils/QueryBuilder";
import { ConfigurationError, describeCause } from "../errors/LyricsErrors";
import {
    APP_NAME,
    DEFAULT_LRCLIB_URL,
    DEFAULT_REQUEST_TIMEOUT_MS,
    DEFAULT_TOLERANCE_SECONDS,
    IGNORE_FILE_NAME,
} from "../constants";

export interface SyncConfig {
    readonly rootDir: string;
    readonly lrclibUrl: string;
    readonly skipHidden: boolean;
    readonly force: boolean;
    /** Raw `--ignore` tokens, kept for logging. */
    readonly ignore: readonly string[];
    readonly suppression: SuppressionFlags;
    readonly searchFallback: boolean;
    readonly tolerance: number;
    readonly requestTimeoutMs: number;
    readonly ignoreFileName: string;
    readonly verbose: boolean;
}

export type CliCommand =
    | { kind: "run"; config: SyncConfig }
    | { kind: "help" }
    | { kind: "version" };

const MAX_TIMEOUT_MS = 4294967295;

type Env = Record<string, string | undefined>;

export const USAGE = `Usage: ${APP_NAME} [options] [directory]

Pulls synced .lrc files from LRCLIB for the audio files under [directory]
(default: the current directory).

Options:
  -u, --lrclib-url <url>   LRCLIB base URL (default: ${DEFAULT_LRCLIB_URL}, env LRCLIB_URL)
  -a, --hidden             skip hidden files and directories
  -f, --force              overwrite existing lrc files
  -i, --ignore <fields>    don't send these properties to LRCLIB, comma separated:
                           duration, album (album_name), artist (artist_name, search only)
  -s, --search             use searching on LRCLIB as a fallback
  -t, --tolerance <secs>   duration tolerance for search results (default: ${DEFAULT_TOLERANCE_SECONDS}, <= 0 disables)
  -v, --verbose            debug logging
  -h, --help               show this help
      --version            show the version
`;

/**
 * Reads the command line, falling back to environment variables and then
 * to defaults. Throws `ConfigurationError` on bad input.
 */
export function loadConfig(argv: string[], env: Env = process.env): CliCommand {
    const { values, positionals } = parseCommandLine(argv);

    if (values.help) {
        return { kind: "help" };
    }
    if (values.version) {
        return { kind: "version" };
    }
    if (positionals.length > 1) {
        throw new ConfigurationError(`Expected at most one directory, got ${positionals.length}`);
    }

    const ignoreTokens = splitList(values.ignore ?? (env.LRCSYNC_IGNORE ? [env.LRCSYNC_IGNORE] : []));
    const lrclibUrl = (values["lrclib-url"] ?? env.LRCLIB_URL ?? DEFAULT_LRCLIB_URL).trim().replace(/\/+$/, "");

    try {
        new URL(lrclibUrl);
    } catch {
        throw new ConfigurationError(`Invalid LRCLIB URL: ${lrclibUrl}`);
    }

    const config: SyncConfig = {
        rootDir: positionals[0] ?? ".",
        lrclibUrl,
        skipHidden: values.hidden ?? false,
        force: values.force ?? false,
        ignore: ignoreTokens,
        suppression: parseIgnoreFields(ignoreTokens),
        searchFallback: values.search ?? parseBoolean(env.LRCSYNC_SEARCH),
        tolerance: parseNumber("tolerance", values.tolerance ?? env.LRCSYNC_TOLERANCE, DEFAULT_TOLERANCE_SECONDS),
        requestTimeoutMs: parseNumber("LRCSYNC_TIMEOUT_MS", env.LRCSYNC_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
        ignoreFileName: IGNORE_FILE_NAME,
        verbose: values.verbose ?? false,
    };

    // AbortSignal.timeout only takes whole milliseconds up to 2^32 - 1
    const timeout = config.requestTimeoutMs;
    if (!Number.isInteger(timeout) || timeout <= 0 || timeout > MAX_TIMEOUT_MS) {
        throw new ConfigurationError(`LRCSYNC_TIMEOUT_MS must be a whole number from 1 to ${MAX_TIMEOUT_MS}, got ${timeout}`);
    }

    return { kind: "run", config };
}

function parseCommandLine(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            strict: true,
            options: {
                "lrclib-url": { type: "string", short: "u" },
                hidden: { type: "boolean", short: "a" },
                force: { type: "boolean", short: "f" },
                ignore: { type: "string", short: "i", multiple: true },
                search: { type: "boolean", short: "s" },
                tolerance: { type: "string", short: "t" },
                verbose: { type: "boolean", short: "v" },
                help: { type: "boolean", short: "h" },
                version: { type: "boolean" },
            },
        });
    } catch (error) {
        throw new ConfigurationError(describeCause(error));
    }
}

function splitList(values: string[]): string[] {
    return values
        .flatMap(v => v.split(","))
        .map(v => v.trim())
        .filter(v => v.length > 0);
}

function parseBoolean(value: string | undefined): boolean {
    if (value === undefined) return false;
    return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parseNumber(name: string, value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === "") {
        return fallback;
    }
    const num = Number(value);
    if (Number.isNaN(num)) {
        throw new ConfigurationError(`${name} must be a number, got "${value}"`);
    }
    return num;
}
