import { LookupQuery } from "./LookupQuery";
import { LyricsCandidate } from "./LyricsCandidate";

/**
 * Remote lyrics lookups.
 * Implementations resolve to `null` when the service reports "not found"
 * and reject with a `LyricsError` subclass on any other failure.
 */
export interface LyricsClient {
    /**
     * Single-record lookup keyed by track, artist, album and duration.
     */
    exactGet(query: LookupQuery): Promise<LyricsCandidate | null>;

    /**
     * Multi-record search keyed by track, artist and album.
     * May resolve to an empty list.
     */
    fuzzySearch(query: LookupQuery): Promise<LyricsCandidate[] | null>;
}
