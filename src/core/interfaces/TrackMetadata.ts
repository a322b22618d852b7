/**
 * Tag data read from a single audio file.
 * Every field may be missing from the file; missing text fields are empty.
 */
export interface TrackMetadata {
    /** Track title, "" when the file has none. */
    readonly title: string;

    /**
     * Artist names in tag order.
     * Joined with ", " when sent to the lyrics service.
     */
    readonly artists: readonly string[];

    /** Album title, if tagged. */
    readonly album?: string;

    /** Track length in seconds (fractional). */
    readonly duration?: number;
}
