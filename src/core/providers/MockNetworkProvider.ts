import { LyricsClient } from "../interfaces/LyricsClient";
import { LyricsCandidate } from "../interfaces/LyricsCandidate";
import { LookupQuery } from "../interfaces/LookupQuery";

/** What a scripted call answers with: a value, "not found" (null) or a failure. */
export type MockReply<T> = T | null | Error;

export interface MockScript {
    exact?: MockReply<LyricsCandidate>;
    search?: MockReply<LyricsCandidate[]>;
}

/**
 * In-process `LyricsClient` that answers from a fixed script and records
 * every query it receives.
 */
export class MockNetworkProvider implements LyricsClient {
    public readonly exactCalls: LookupQuery[] = [];
    public readonly searchCalls: LookupQuery[] = [];

    constructor(private readonly script: MockScript = {}) {}

    public async exactGet(query: LookupQuery): Promise<LyricsCandidate | null> {
        this.exactCalls.push({ ...query });
        return settle(this.script.exact);
    }

    public async fuzzySearch(query: LookupQuery): Promise<LyricsCandidate[] | null> {
        this.searchCalls.push({ ...query });
        const reply = settle(this.script.search);
        return reply === null ? null : [...reply];
    }
}

function settle<T>(reply: MockReply<T> | undefined): T | null {
    if (reply instanceof Error) {
        throw reply;
    }
    return reply ?? null;
}

let nextId = 1;

/** Builds a candidate record with sensible defaults for tests. */
export function makeCandidate(overrides: Partial<LyricsCandidate> = {}): LyricsCandidate {
    return {
        id: nextId++,
        trackName: "Song",
        artistName: "Band",
        albumName: "Rec",
        duration: 200,
        instrumental: false,
        plainLyrics: "hi",
        syncedLyrics: "[00:01.00]hi",
        ...overrides,
    };
}
