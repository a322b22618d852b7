import { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import ignore from "ignore";
import { Logger } from "../utils/Logger";
import { IGNORE_FILE_NAME } from "../constants";

const AUDIO_EXTENSIONS = new Set([
    ".aac", ".ac3", ".aif", ".aifc", ".aiff", ".alac", ".ape", ".au", ".caf",
    ".dsf", ".flac", ".m4a", ".m4b", ".mka", ".mp2", ".mp3", ".mpc", ".oga",
    ".ogg", ".opus", ".spx", ".tta", ".wav", ".weba", ".wma", ".wv",
]);

export function isAudioFile(filePath: string): boolean {
    return AUDIO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export type ScanEntry =
    | { ok: true; path: string }
    | { ok: false; path: string; error: Error };

export interface ScannerOptions {
    /** Skip files and directories whose name starts with ".". */
    skipHidden?: boolean;
    /** Per-directory ignore file in gitignore syntax. */
    ignoreFileName?: string;
}

interface IgnoreScope {
    dir: string;
    rules: ReturnType<typeof ignore>;
}

/**
 * Depth-first walk of a music library honouring custom ignore files.
 * Yields every non-ignored file; directories that cannot be read are
 * reported as entries with `ok: false` and the walk moves on.
 */
export class LibraryScanner {
    private readonly skipHidden: boolean;
    private readonly ignoreFileName: string;

    constructor(options: ScannerOptions = {}) {
        this.skipHidden = options.skipHidden ?? false;
        this.ignoreFileName = options.ignoreFileName ?? IGNORE_FILE_NAME;
    }

    public async *scan(rootDir: string): AsyncGenerator<ScanEntry> {
        yield* this.walk(rootDir, []);
    }

    private async *walk(dir: string, scopes: IgnoreScope[]): AsyncGenerator<ScanEntry> {
        let entries: Dirent[];
        try {
            entries = await readdir(dir, { withFileTypes: true });
        } catch (error) {
            yield { ok: false, path: dir, error: toError(error) };
            return;
        }

        const ownScope = await this.loadScope(dir, entries.some(e => e.isFile() && e.name === this.ignoreFileName));
        const active = ownScope ? [...scopes, ownScope] : scopes;

        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const entry of entries) {
            if (this.skipHidden && entry.name.startsWith(".")) {
                continue;
            }
            const fullPath = path.join(dir, entry.name);
            const isDir = entry.isDirectory();
            if (isIgnored(active, fullPath, isDir)) {
                Logger.debug(`[Scanner] Ignoring ${fullPath}`);
                continue;
            }
            if (isDir) {
                yield* this.walk(fullPath, active);
            } else if (entry.isFile()) {
                yield { ok: true, path: fullPath };
            }
        }
    }

    private async loadScope(dir: string, present: boolean): Promise<IgnoreScope | null> {
        if (!present) {
            return null;
        }
        const file = path.join(dir, this.ignoreFileName);
        try {
            const rules = ignore().add(await readFile(file, "utf-8"));
            return { dir, rules };
        } catch (error) {
            Logger.warn(`[Scanner] Could not read ${file}, ignoring it`, error);
            return null;
        }
    }
}

function isIgnored(scopes: IgnoreScope[], fullPath: string, isDir: boolean): boolean {
    return scopes.some(scope => {
        const relative = path.relative(scope.dir, fullPath).split(path.sep).join("/");
        const candidate = isDir ? `${relative}/` : relative;
        // Names made only of dots (e.g. "...") are rejected by `ignores`; no rule can match them
        return ignore.isPathValid(candidate) && scope.rules.ignores(candidate);
    });
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
