/**
 * Bibliographic record types shared by every stage of a search run.
 */

/**
 * One bibliographic hit produced by one source adapter.
 * `sourceName` and `methodTag` are stamped by the adapter before the record leaves it.
 */
export interface CandidateRecord {
    /** Paper title (never empty once validated) */
    title: string;

    /** Formatted author list, or the `UNKNOWN_AUTHORS` sentinel */
    authors: string;

    /** Abstract or search snippet (may be empty, length-capped) */
    abstract: string;

    /** Publication year, when one could be determined */
    year?: number;

    /** Landing page or PDF URL (may be empty) */
    url: string;

    /** Digital Object Identifier without resolver prefix */
    doi?: string;

    /** Display name of the source that produced the record */
    sourceName: string;

    /** Technique inside the adapter that produced the record (e.g. `direct_scholar`) */
    methodTag: string;

    /** Terms that were sent to the source */
    searchTermsUsed: string[];
}

/**
 * A record that survived deduplication. `id` is dense, 1-based and never reused within a run.
 */
export interface CorpusRecord extends CandidateRecord {
    readonly id: number;
}

/**
 * Deduplicated set of records for one search run.
 */
export interface Corpus {
    readonly records: readonly CorpusRecord[];
}

export const UNKNOWN_AUTHORS = 'Unknown';

/**
 * Where a term set came from. Kinds are tried in this order.
 */
export type TermSetKind = 'research_question' | 'keywords' | 'fallback';

/**
 * A prioritized group of search terms tried together against a source.
 * Lower `priority` is tried first.
 */
export interface SearchTermSet {
    readonly terms: readonly string[];
    readonly kind: TermSetKind;
    readonly priority: number;
    readonly description: string;
}
