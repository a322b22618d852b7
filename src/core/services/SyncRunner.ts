import { Logger } from "../utils/Logger";
import { LibraryScanner, isAudioFile } from "./LibraryScanner";
import { LyricsResolver, ResolveOptions } from "./LyricsResolver";
import { LrcWriter } from "./LrcWriter";
import { TrackMetadata } from "../interfaces/TrackMetadata";
import { LyricsParser } from "../interfaces/LyricsParser";
import { NotFoundReason, ResolvedOutcome } from "../interfaces/ResolutionOutcome";
import { StandardLrcParser } from "../parsers/StandardLrcParser";
import { SchemaError, describeCause } from "../errors/LyricsErrors";

export type FileStatus = "written" | "skipped" | "not-found" | "failed";

export interface FileResult {
    /** Absent for walk errors that are not tied to a file. */
    path?: string;
    status: FileStatus;
    detail?: string;
}

export interface SyncReport {
    results: FileResult[];
    counts: Record<FileStatus, number>;
}

export interface TagReader {
    read(path: string): Promise<TrackMetadata>;
}

export interface SyncRunnerOptions extends ResolveOptions {
    /** Overwrite .lrc files that already exist. */
    force: boolean;
}

const NOT_FOUND_DETAIL: Record<NotFoundReason, string> = {
    "no-match": "no exact match",
    "no-results": "no results",
    "no-synced-lyrics": "no synced lyrics",
    "outside-tolerance": "no result within tolerance",
};

/**
 * Walks a library and fetches lyrics for one audio file at a time.
 * A failure on one file is logged and recorded; the run always continues.
 */
export class SyncRunner {
    constructor(
        private readonly scanner: LibraryScanner,
        private readonly tags: TagReader,
        private readonly resolver: LyricsResolver,
        private readonly writer: LrcWriter,
        private readonly options: SyncRunnerOptions,
        private readonly parser: LyricsParser = new StandardLrcParser()
    ) {}

    public async run(rootDir: string): Promise<SyncReport> {
        const report: SyncReport = {
            results: [],
            counts: { written: 0, skipped: 0, "not-found": 0, failed: 0 },
        };

        for await (const entry of this.scanner.scan(rootDir)) {
            let result: FileResult | null;
            if (!entry.ok) {
                Logger.error(`[Sync] Error walking: ${entry.path}: ${entry.error.message}`);
                result = { status: "failed", detail: entry.error.message };
            } else if (!isAudioFile(entry.path)) {
                result = null;
            } else {
                result = await this.syncFile(entry.path);
            }

            if (result) {
                report.results.push(result);
                report.counts[result.status]++;
            }
        }

        Logger.info(
            `[Sync] Done: ${report.counts.written} written, ${report.counts.skipped} skipped, ` +
            `${report.counts["not-found"]} not found, ${report.counts.failed} failed`
        );
        return report;
    }

    /** Never rejects: every failure is turned into a `failed` result. */
    public async syncFile(path: string): Promise<FileResult> {
        try {
            return await this.syncFileOrThrow(path);
        } catch (error) {
            const detail = describeCause(error);
            Logger.error(`[Sync] Error in processing ${path}: ${detail}`);
            return { path, status: "failed", detail };
        }
    }

    private async syncFileOrThrow(path: string): Promise<FileResult> {
        if (!this.options.force && await this.writer.exists(path)) {
            Logger.info(`[Sync] Skipping ${path}: lrc file already exists`);
            return { path, status: "skipped", detail: "lrc file already exists" };
        }

        const metadata = await this.tags.read(path);
        const outcome = await this.resolver.resolve(metadata, this.options);

        switch (outcome.kind) {
            case "error": {
                const { error } = outcome;
                if (error instanceof SchemaError) {
                    Logger.error(`[Sync] LRCLIB API schema changed? Could not read response for ${path}: ${error.message}`);
                } else {
                    Logger.error(`[Sync] Error finding lrc for ${path}: ${error.message}`);
                }
                return { path, status: "failed", detail: error.message };
            }
            case "not-found": {
                const detail = NOT_FOUND_DETAIL[outcome.reason];
                Logger.info(`[Sync] Did not find lrc for ${path} (${detail})`);
                return { path, status: "not-found", detail };
            }
            case "resolved":
                this.logMatch(path, outcome);
                return this.writeLyrics(path, outcome);
        }
    }

    private logMatch(path: string, outcome: ResolvedOutcome) {
        if (outcome.source === "exact") {
            Logger.info(`[Sync] Found synced lrc for ${path}`);
            return;
        }
        Logger.info(
            `[Sync] Searched lrc (found ${outcome.matchedDuration}secs vs actual ${outcome.targetDuration ?? "unknown "}secs ` +
            `out of ${outcome.candidateCount} filtered results) for ${path}`
        );
    }

    private async writeLyrics(path: string, outcome: ResolvedOutcome): Promise<FileResult> {
        const target = await this.writer.write(path, outcome.lyricsText);
        const lineCount = this.parser.parse(outcome.lyricsText).lines.length;
        Logger.info(`[Sync] Wrote synced lrc to ${target} (${lineCount} lines)`);
        return { path, status: "written", detail: target };
    }
}
