/**
 * A lyrics record as returned by LRCLIB's `get` and `search` endpoints.
 */
export interface LyricsCandidate {
    id: number;
    trackName: string;
    artistName: string;
    albumName: string;

    /** Seconds, as reported by the service. */
    duration: number;

    instrumental: boolean;

    plainLyrics?: string;

    /** LRC text with `[mm:ss.xx]` line timestamps. */
    syncedLyrics?: string;
}
