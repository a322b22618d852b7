export { LRCLibNetworkProvider, parseCandidate } from "./core/providers/LRCLibNetworkProvider";
export type { LRCLibOptions } from "./core/providers/LRCLibNetworkProvider";
export { CandidateSelector, durationDelta } from "./core/services/CandidateSelector";
export type { Selection } from "./core/services/CandidateSelector";
export { LyricsResolver, DEFAULT_RESOLVE_OPTIONS } from "./core/services/LyricsResolver";
export type { ResolveOptions } from "./core/services/LyricsResolver";
export { MetadataService } from "./core/services/MetadataService";
export { LibraryScanner, isAudioFile } from "./core/services/LibraryScanner";
export type { ScanEntry, ScannerOptions } from "./core/services/LibraryScanner";
export { LrcWriter, lrcPathFor } from "./core/services/LrcWriter";
export { SyncRunner } from "./core/services/SyncRunner";
export type { FileResult, FileStatus, SyncReport, SyncRunnerOptions, TagReader } from "./core/services/SyncRunner";
export { buildQuery, forSearch, parseIgnoreFields, toGetParams, toSearchParams, NO_SUPPRESSION } from "./core/utils/QueryBuilder";
export { Logger } from "./core/utils/Logger";
export type { LogEntry, LogLevel } from "./core/utils/Logger";
export { loadConfig } from "./core/config/CliConfig";
export type { SyncConfig, CliCommand } from "./core/config/CliConfig";
export * from "./core/errors/LyricsErrors";
export type { TrackMetadata } from "./core/interfaces/TrackMetadata";
export type { LookupQuery, SuppressionFlags } from "./core/interfaces/LookupQuery";
export type { LyricsCandidate } from "./core/interfaces/LyricsCandidate";
export type { LyricsClient } from "./core/interfaces/LyricsClient";
export type { ResolutionOutcome, ResolvedOutcome, NotFoundOutcome, ErrorOutcome, NotFoundReason } from "./core/interfaces/ResolutionOutcome";
export { createRunner } from "./runner";
