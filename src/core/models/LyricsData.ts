/**
 * One timed line of an LRC file.
 */
export interface LyricsLine {
    /** Absolute start time in ms */
    startTime: number;

    text: string;
}

export interface LyricsData {
    /** Sorted by start time; a line with several timestamps appears once per timestamp. */
    lines: LyricsLine[];
}
