import { LyricsData } from "../models/LyricsData";

/**
 * Turns downloaded lyrics text into timed lines.
 */
export interface LyricsParser {
    parse(rawText: string): LyricsData;
}
