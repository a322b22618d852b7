import { Logger } from "../utils/Logger";
import { buildQuery, forSearch, NO_SUPPRESSION } from "../utils/QueryBuilder";
import { CandidateSelector } from "./CandidateSelector";
import { LyricsClient } from "../interfaces/LyricsClient";
import { TrackMetadata } from "../interfaces/TrackMetadata";
import { SuppressionFlags } from "../interfaces/LookupQuery";
import { ResolutionOutcome } from "../interfaces/ResolutionOutcome";
import { LyricsError } from "../errors/LyricsErrors";
import { DEFAULT_TOLERANCE_SECONDS } from "../constants";

export interface ResolveOptions {
    suppression: SuppressionFlags;
    /** Fall back to `/api/search` when the exact lookup misses. */
    searchFallback: boolean;
    /** Seconds. `<= 0` disables the duration filter on search results. */
    tolerance: number;
}

export const DEFAULT_RESOLVE_OPTIONS: ResolveOptions = {
    suppression: NO_SUPPRESSION,
    searchFallback: false,
    tolerance: DEFAULT_TOLERANCE_SECONDS,
};

/**
 * Turns track metadata into synced lyrics: exact lookup first, then
 * (optionally) a search ranked by duration.
 *
 * Holds no per-track state, so one instance can serve any number of files.
 */
export class LyricsResolver {
    constructor(
        private readonly client: LyricsClient,
        private readonly selector = new CandidateSelector()
    ) {}

    public async resolve(metadata: TrackMetadata, options: ResolveOptions = DEFAULT_RESOLVE_OPTIONS): Promise<ResolutionOutcome> {
        try {
            return await this.resolveOrThrow(metadata, options);
        } catch (error) {
            if (error instanceof LyricsError) {
                return { kind: "error", error };
            }
            throw error;
        }
    }

    private async resolveOrThrow(metadata: TrackMetadata, options: ResolveOptions): Promise<ResolutionOutcome> {
        const query = buildQuery(metadata, options.suppression);

        const exact = await this.client.exactGet(query);
        if (exact) {
            if (exact.syncedLyrics === undefined) {
                Logger.debug(`[Resolver] Exact match ${exact.id} has no synced lyrics`);
                return { kind: "not-found", reason: "no-synced-lyrics" };
            }
            return {
                kind: "resolved",
                source: "exact",
                candidate: exact,
                lyricsText: exact.syncedLyrics,
                matchedDuration: exact.duration,
                targetDuration: query.duration,
                candidateCount: 1,
            };
        }

        if (!options.searchFallback) {
            return { kind: "not-found", reason: "no-match" };
        }

        const searchQuery = forSearch(query, options.suppression);
        const results = await this.client.fuzzySearch(searchQuery);
        if (!results || results.length === 0) {
            return { kind: "not-found", reason: "no-results" };
        }

        const { candidate, survivors } = this.selector.select(results, searchQuery.duration, options.tolerance);
        if (!candidate) {
            Logger.debug(`[Resolver] None of ${results.length} search results within ${options.tolerance}s of ${searchQuery.duration}s`);
            return { kind: "not-found", reason: "outside-tolerance" };
        }
        if (candidate.syncedLyrics === undefined) {
            Logger.debug(`[Resolver] Best search result ${candidate.id} has no synced lyrics`);
            return { kind: "not-found", reason: "no-synced-lyrics" };
        }

        return {
            kind: "resolved",
            source: "search",
            candidate,
            lyricsText: candidate.syncedLyrics,
            matchedDuration: candidate.duration,
            targetDuration: searchQuery.duration,
            candidateCount: survivors,
        };
    }
}
