import { LyricsCandidate } from "../interfaces/LyricsCandidate";

export interface Selection {
    /** Best candidate, or null when nothing survived. */
    candidate: LyricsCandidate | null;
    /** How many candidates were left after ranking and tolerance filtering. */
    survivors: number;
}

/**
 * Picks the search result whose duration is closest to the track's.
 */
export class CandidateSelector {
    /**
     * With no target duration the first candidate wins and tolerance is not
     * applied. Otherwise candidates are ranked by |duration - target| (stable,
     * NaN last), and when `tolerance > 0` only deltas strictly below it are kept.
     */
    public select(candidates: readonly LyricsCandidate[], targetDuration: number | undefined, tolerance: number): Selection {
        if (targetDuration === undefined) {
            return {
                candidate: candidates[0] ?? null,
                survivors: candidates.length,
            };
        }

        const ranked = this.rank(candidates, targetDuration);
        const kept = tolerance > 0
            ? ranked.filter(c => durationDelta(c, targetDuration) < tolerance)
            : ranked;

        return {
            candidate: kept[0] ?? null,
            survivors: kept.length,
        };
    }

    /** Sorted copy, closest first. */
    public rank(candidates: readonly LyricsCandidate[], targetDuration: number): LyricsCandidate[] {
        return candidates
            .map((candidate, index) => ({ candidate, index, delta: durationDelta(candidate, targetDuration) }))
            .sort((a, b) => compareDelta(a.delta, b.delta) || a.index - b.index)
            .map(entry => entry.candidate);
    }
}

/** Absolute distance in seconds; NaN when either side is not a number. */
export function durationDelta(candidate: LyricsCandidate, targetDuration: number): number {
    return Math.abs(candidate.duration - targetDuration);
}

function compareDelta(a: number, b: number): number {
    const left = Number.isNaN(a) ? Infinity : a;
    const right = Number.isNaN(b) ? Infinity : b;
    if (left === right) return 0;
    return left < right ? -1 : 1;
}
