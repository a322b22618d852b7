import { access, writeFile } from "node:fs/promises";
import path from "node:path";
import { LocalIOError } from "../errors/LyricsErrors";
import { LRC_EXTENSION } from "../constants";

/** `/music/a/song.flac` -> `/music/a/song.lrc` */
export function lrcPathFor(audioPath: string): string {
    const parsed = path.parse(audioPath);
    return path.join(parsed.dir, `${parsed.name}${LRC_EXTENSION}`);
}

export class LrcWriter {
    public async exists(audioPath: string): Promise<boolean> {
        try {
            await access(lrcPathFor(audioPath));
            return true;
        } catch {
            return false;
        }
    }

    /** Writes (or overwrites) the .lrc beside `audioPath` and returns its path. */
    public async write(audioPath: string, syncedLyrics: string): Promise<string> {
        const target = lrcPathFor(audioPath);
        try {
            await writeFile(target, syncedLyrics, "utf-8");
        } catch (error) {
            throw new LocalIOError(target, "Writing lrc file", error);
        }
        return target;
    }
}
