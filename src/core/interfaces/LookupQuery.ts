/**
 * Fields sent to the lyrics service for one track.
 * Built fresh per file by the query builder and not changed once sent.
 */
export interface LookupQuery {
    trackName: string;

    /** Always sent on the exact lookup, even when empty. */
    artistName: string;

    albumName?: string;

    /** Seconds. Never sent on search; used locally for ranking there. */
    duration?: number;
}

/**
 * Which query fields the user asked us to leave out.
 * Resolved once from the raw `--ignore` tokens.
 */
export interface SuppressionFlags {
    readonly suppressDuration: boolean;
    readonly suppressAlbum: boolean;
    /** Artist is only dropped on the search fallback, never on the exact lookup. */
    readonly suppressArtistOnSearch: boolean;
}
