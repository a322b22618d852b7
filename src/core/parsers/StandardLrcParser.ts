import { LyricsParser } from "../interfaces/LyricsParser";
import { LyricsData, LyricsLine } from "../models/LyricsData";

/**
 * Parses line-synced LRC: `[mm:ss.xx]Text`, several timestamps per line
 * allowed. ID tags such as `[ti:Title]` and untimed text are skipped.
 */
export class StandardLrcParser implements LyricsParser {
    // [mm:ss], [mm:ss.xx] or [mm:ss.xxx]
    private static TIMESTAMP_REGEX = /\[(\d{1,3}):(\d{2}(?:\.\d{1,3})?)\]/g;

    public parse(rawText: string): LyricsData {
        const lines: LyricsLine[] = [];

        for (const rawLine of rawText.split(/\r?\n/)) {
            const line = rawLine.trim();
            const matches = [...line.matchAll(StandardLrcParser.TIMESTAMP_REGEX)];
            if (matches.length === 0) continue;

            const text = line.replace(StandardLrcParser.TIMESTAMP_REGEX, "").trim();
            for (const match of matches) {
                const minutes = parseInt(match[1], 10);
                const seconds = parseFloat(match[2]);
                lines.push({ startTime: Math.round((minutes * 60 + seconds) * 1000), text });
            }
        }

        // Array.prototype.sort is stable, so lines sharing a timestamp keep file order
        lines.sort((a, b) => a.startTime - b.startTime);
        return { lines };
    }
}
