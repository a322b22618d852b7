import { describe, it, expect } from 'vitest';
import { CandidateSelector } from './CandidateSelector';
import { makeCandidate } from '../providers/MockNetworkProvider';

describe('CandidateSelector', () => {
    const selector = new CandidateSelector();

    it('should return the first candidate when there is no target duration', () => {
        const candidates = [makeCandidate({ duration: 500 }), makeCandidate({ duration: 200 })];
        const selection = selector.select(candidates, undefined, 5);
        expect(selection.candidate).toBe(candidates[0]);
        expect(selection.survivors).toBe(2);
    });

    it('should return nothing for an empty list', () => {
        expect(selector.select([], undefined, 5)).toEqual({ candidate: null, survivors: 0 });
        expect(selector.select([], 200, 5)).toEqual({ candidate: null, survivors: 0 });
    });

    it('should pick the closest duration within tolerance', () => {
        const candidates = [190, 200, 250].map(duration => makeCandidate({ duration }));
        const selection = selector.select(candidates, 200, 5);
        expect(selection.candidate?.duration).toBe(200);
        expect(selection.survivors).toBe(1);
    });

    it('should find nothing when every candidate is outside tolerance', () => {
        const candidates = [190, 250].map(duration => makeCandidate({ duration }));
        expect(selector.select(candidates, 200, 5).candidate).toBeNull();
    });

    it('should exclude a delta exactly equal to the tolerance', () => {
        const candidates = [makeCandidate({ duration: 205 }), makeCandidate({ duration: 195.5 })];
        const selection = selector.select(candidates, 200, 5);
        expect(selection.candidate?.duration).toBe(195.5);
        expect(selection.survivors).toBe(1);
        expect(selector.select([makeCandidate({ duration: 205 })], 200, 5).candidate).toBeNull();
    });

    it('should keep everything ranked when tolerance is zero or negative', () => {
        const candidates = [250, 190, 203].map(duration => makeCandidate({ duration }));
        for (const tolerance of [0, -1]) {
            const selection = selector.select(candidates, 200, tolerance);
            expect(selection.candidate?.duration).toBe(203);
            expect(selection.survivors).toBe(3);
        }
    });

    it('should keep the original order for equal deltas', () => {
        const a = makeCandidate({ duration: 198 });
        const b = makeCandidate({ duration: 202 });
        const c = makeCandidate({ duration: 198 });
        expect(selector.rank([a, b, c], 200)).toEqual([a, b, c]);
        expect(selector.rank([b, c, a], 200)).toEqual([b, c, a]);
    });

    it('should rank NaN durations last and drop them when filtering', () => {
        const broken = makeCandidate({ duration: NaN });
        const far = makeCandidate({ duration: 900 });
        expect(selector.rank([broken, far], 200)).toEqual([far, broken]);
        expect(selector.select([broken], 200, 5).candidate).toBeNull();
        expect(selector.select([broken], 200, 0).candidate).toBe(broken);
    });
});
