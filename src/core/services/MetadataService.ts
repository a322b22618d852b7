import { IAudioMetadata, parseFile } from "music-metadata";
import { Logger } from "../utils/Logger";
import { TrackMetadata } from "../interfaces/TrackMetadata";
import { LocalIOError } from "../errors/LyricsErrors";

export class MetadataService {

    /**
     * Reads the tags of an audio file.
     * Missing tags come back empty; an unreadable file rejects with `LocalIOError`.
     */
    public async read(path: string): Promise<TrackMetadata> {
        let metadata: IAudioMetadata;
        try {
            metadata = await parseFile(path, { skipCovers: true, duration: false });
        } catch (error) {
            throw new LocalIOError(path, "Reading file metadata", error);
        }

        const common = metadata.common;

        let artists: string[] = [];
        if (common.artists && common.artists.length > 0) {
            artists = common.artists;
        } else if (common.artist) {
            artists = [common.artist];
        }

        const result: TrackMetadata = {
            title: common.title ?? "",
            artists,
            ...(common.album !== undefined ? { album: common.album } : {}),
            ...(metadata.format.duration !== undefined ? { duration: metadata.format.duration } : {}),
        };

        Logger.debug(`[Metadata] ${path}: "${result.title}" by "${artists.join(", ")}" (${result.duration ?? "?"}s)`);
        return result;
    }
}
