import { readFileSync } from 'node:fs';
import { vi } from 'vitest';
import type {
    AdapterSearchOptions,
    CandidateRecord,
    Corpus,
    CorpusRecord,
    SourceAdapter,
    SourceSearchResult,
} from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';

export function readFixture(name: string): string {
    return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

export function candidate(overrides: Partial<CandidateRecord> & { title: string }): CandidateRecord {
    return {
        authors: 'Unknown',
        abstract: '',
        url: '',
        sourceName: 'Test Source',
        methodTag: 'test_api',
        searchTermsUsed: [],
        ...overrides,
    };
}

export function corpusOf(records: Array<Partial<CandidateRecord> & { title: string }>): Corpus {
    return {
        records: records.map((overrides, index): CorpusRecord => ({ ...candidate(overrides), id: index + 1 })),
    };
}

export type FetchHandler = (url: string, init?: RequestInit) => Response | Promise<Response>;

/**
 * A fetch stand-in answering from `handler`; calls are recorded on the mock.
 */
export function stubFetch(handler: FetchHandler) {
    return vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
        const url = input instanceof Request ? input.url : input.toString();
        return handler(url, init);
    });
}

/**
 * HttpClient that never waits and never retries, over the given fetch.
 */
export function testHttpClient(fetchImpl: typeof fetch, options: { maxRetries?: number } = {}): HttpClient {
    return new HttpClient({
        fetch: fetchImpl,
        delayRangeMs: [0, 0],
        maxRetries: options.maxRetries ?? 0,
        sleep: async () => {},
    });
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

export function textResponse(body: string, status = 200): Response {
    return new Response(body, { status });
}

type Responder = (terms: readonly string[], options?: AdapterSearchOptions) => SourceSearchResult | Promise<SourceSearchResult>;

/**
 * Source adapter answering from a function, recording the terms it was called with.
 */
export class StubAdapter implements SourceAdapter {
    readonly kind = 'api' as const;
    readonly calls: string[][] = [];

    constructor(
        readonly name: string,
        private readonly respond: Responder
    ) {}

    async search(terms: readonly string[], options?: AdapterSearchOptions): Promise<SourceSearchResult> {
        this.calls.push([...terms]);
        return this.respond(terms, options);
    }
}

export function succeeded(methodTag: string, records: CandidateRecord[]): SourceSearchResult {
    return { ok: true, methodTag, records };
}

export function failedWith(methodTag: string, reason: 'no-results' | 'network' | 'timeout' = 'no-results'): SourceSearchResult {
    return { ok: false, records: [], methodTag: 'failed', failure: { reason, message: `${methodTag} ${reason}`, methodTag } };
}
