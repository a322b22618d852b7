import { LyricsCandidate } from "./LyricsCandidate";
import { LyricsError } from "../errors/LyricsErrors";

export type ResolutionSource = "exact" | "search";

export interface ResolvedOutcome {
    kind: "resolved";
    source: ResolutionSource;
    candidate: LyricsCandidate;
    lyricsText: string;
    matchedDuration: number;
    targetDuration?: number;
    /** Candidates left after tolerance filtering (1 for an exact hit). */
    candidateCount: number;
}

export type NotFoundReason =
    | "no-match"
    | "no-results"
    | "no-synced-lyrics"
    | "outside-tolerance";

export interface NotFoundOutcome {
    kind: "not-found";
    reason: NotFoundReason;
}

export interface ErrorOutcome {
    kind: "error";
    error: LyricsError;
}

export type ResolutionOutcome = ResolvedOutcome | NotFoundOutcome | ErrorOutcome;
