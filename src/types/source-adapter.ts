import type { CandidateRecord } from './record.js';

/**
 * Why an adapter produced nothing.
 */
export type AdapterFailureReason =
    | 'network'
    | 'http-status'
    | 'parse'
    | 'no-results'
    | 'missing-api-key'
    | 'timeout'
    | 'no-terms';

/**
 * Typed failure value. Adapters never throw past their boundary; they return this instead.
 */
export interface AdapterFailure {
    reason: AdapterFailureReason;
    message: string;
    /** Technique that failed last */
    methodTag?: string;
}

/**
 * Outcome of one `SourceAdapter.search` call.
 */
export type SourceSearchResult =
    | { ok: true; records: CandidateRecord[]; methodTag: string }
    | { ok: false; records: []; methodTag: 'failed'; failure: AdapterFailure };

/**
 * Per-call options passed by the orchestrator.
 */
export interface AdapterSearchOptions {
    /** Maximum records to return */
    limit?: number;

    /** Aborted when the run-level timeout fires */
    signal?: AbortSignal;
}

/**
 * Interface for source adapters (Semantic Scholar, PubMed, Google Scholar, etc.).
 * Each adapter hides its request/response shapes and normalizes hits into CandidateRecord.
 */
export interface SourceAdapter {
    /** Display name, also used as the registry key */
    readonly name: string;

    /** Whether the adapter talks to a structured API or scrapes HTML */
    readonly kind: 'api' | 'scrape';

    /**
     * Search the source with one term set.
     * Always resolves; failures come back as `{ ok: false }`.
     */
    search(terms: readonly string[], options?: AdapterSearchOptions): Promise<SourceSearchResult>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from config or environment variable) */
    apiKey?: string;

    /** Contact email for polite pool (OpenAlex) */
    email?: string;

    /** Default per-call result cap */
    maxResults?: number;
}
