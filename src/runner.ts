import { SyncConfig } from "./core/config/CliConfig";
import { LRCLibNetworkProvider } from "./core/providers/LRCLibNetworkProvider";
import { LibraryScanner } from "./core/services/LibraryScanner";
import { LrcWriter } from "./core/services/LrcWriter";
import { LyricsResolver } from "./core/services/LyricsResolver";
import { MetadataService } from "./core/services/MetadataService";
import { SyncRunner } from "./core/services/SyncRunner";

/** Wires the production collaborators for one run. */
export function createRunner(config: SyncConfig): SyncRunner {
    const client = new LRCLibNetworkProvider({
        baseUrl: config.lrclibUrl,
        requestTimeoutMs: config.requestTimeoutMs,
    });
    return new SyncRunner(
        new LibraryScanner({ skipHidden: config.skipHidden, ignoreFileName: config.ignoreFileName }),
        new MetadataService(),
        new LyricsResolver(client),
        new LrcWriter(),
        {
            force: config.force,
            suppression: config.suppression,
            searchFallback: config.searchFallback,
            tolerance: config.tolerance,
        }
    );
}
