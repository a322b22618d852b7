import { TrackMetadata } from "../interfaces/TrackMetadata";
import { LookupQuery, SuppressionFlags } from "../interfaces/LookupQuery";

export const NO_SUPPRESSION: SuppressionFlags = {
    suppressDuration: false,
    suppressAlbum: false,
    suppressArtistOnSearch: false,
};

/**
 * Resolves raw `--ignore` tokens into suppression flags.
 * Tokens are case-sensitive; anything unrecognised is ignored.
 */
export function parseIgnoreFields(tokens: Iterable<string>): SuppressionFlags {
    const set = new Set(tokens);
    return {
        suppressDuration: set.has("duration"),
        suppressAlbum: set.has("album_name") || set.has("album"),
        suppressArtistOnSearch: set.has("artist_name") || set.has("artist"),
    };
}

export function artistDisplayName(artists: readonly string[]): string {
    return artists.join(", ");
}

/**
 * Builds the lookup query for one track.
 * Artist suppression is not applied here, see `forSearch`.
 */
export function buildQuery(metadata: TrackMetadata, flags: SuppressionFlags = NO_SUPPRESSION): LookupQuery {
    const query: LookupQuery = {
        trackName: metadata.title,
        artistName: artistDisplayName(metadata.artists),
    };

    if (metadata.album !== undefined && !flags.suppressAlbum) {
        query.albumName = metadata.album;
    }
    if (metadata.duration !== undefined && !flags.suppressDuration) {
        query.duration = metadata.duration;
    }

    return query;
}

/**
 * Copy of `query` for the search fallback, with the artist cleared when
 * the user asked for it. The exact-lookup query is left untouched.
 */
export function forSearch(query: LookupQuery, flags: SuppressionFlags): LookupQuery {
    if (!flags.suppressArtistOnSearch) {
        return query;
    }
    return { ...query, artistName: "" };
}

/** Parameters for `GET /api/get`. `artist_name` is always present. */
export function toGetParams(query: LookupQuery): [string, string][] {
    const params: [string, string][] = [
        ["track_name", query.trackName],
        ["artist_name", query.artistName],
    ];
    if (query.albumName !== undefined) {
        params.push(["album_name", query.albumName]);
    }
    if (query.duration !== undefined) {
        params.push(["duration", formatDuration(query.duration)]);
    }
    return params;
}

/** Parameters for `GET /api/search`. Duration is never sent. */
export function toSearchParams(query: LookupQuery): [string, string][] {
    const params: [string, string][] = [["track_name", query.trackName]];
    if (query.artistName.length > 0) {
        params.push(["artist_name", query.artistName]);
    }
    if (query.albumName !== undefined) {
        params.push(["album_name", query.albumName]);
    }
    return params;
}

function formatDuration(seconds: number): string {
    // Shortest round-trip form: 200 -> "200", 200.5 -> "200.5"
    return String(seconds);
}
