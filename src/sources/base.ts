import type {
    AdapterFailure,
    AdapterFailureReason,
    AdapterSearchOptions,
    CandidateRecord,
    SourceAdapter,
    SourceAdapterOptions,
    SourceSearchResult,
} from '../types/index.js';
import { AbortedError } from '../utils/async.js';
import { HttpClient, HttpError, ResponseParseError } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { isAcademic, isStructurallyValid } from '../validation/academic-filter.js';
import { z } from 'zod';

/**
 * A record as parsed by a technique, before the adapter stamps provenance on it.
 */
export type RawHit = Omit<CandidateRecord, 'sourceName' | 'methodTag' | 'searchTermsUsed'>;

export interface TechniqueContext {
    limit: number;
    signal?: AbortSignal;
}

/**
 * One way of querying a source. Techniques of an adapter are tried in order
 * and the first that yields valid records wins.
 */
export interface SearchTechnique {
    /** Reported as the record's `methodTag` */
    readonly tag: string;
    /** `scrape` hits go through the academic filter, `api` hits through structural validation */
    readonly kind: 'api' | 'scrape';
    run(terms: readonly string[], context: TechniqueContext): Promise<RawHit[]>;
}

/**
 * Error a technique throws to pick the failure reason itself.
 */
export class AdapterError extends Error {
    constructor(
        public readonly reason: AdapterFailureReason,
        message: string
    ) {
        super(message);
        this.name = 'AdapterError';
    }
}

/**
 * Base class for every source adapter: runs the adapter's techniques sequentially,
 * validates and stamps hits, and turns every thrown error into an AdapterFailure.
 */
export abstract class FallbackChainAdapter implements SourceAdapter {
    abstract readonly name: string;
    abstract readonly kind: 'api' | 'scrape';

    protected httpClient: HttpClient;
    protected readonly maxResults: number;

    constructor(options?: SourceAdapterOptions & { httpClient?: HttpClient }) {
        this.httpClient = options?.httpClient ?? new HttpClient();
        this.maxResults = options?.maxResults ?? 100;
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    protected abstract techniques(): readonly SearchTechnique[];

    async search(terms: readonly string[], options: AdapterSearchOptions = {}): Promise<SourceSearchResult> {
        const logger = getLogger();
        const cleaned = terms.map((term) => term.trim()).filter((term) => term.length > 0);
        if (cleaned.length === 0) {
            return failed({ reason: 'no-terms', message: `${this.name}: no search terms supplied` });
        }

        const limit = options.limit ?? this.maxResults;
        let lastFailure: AdapterFailure = { reason: 'no-results', message: `${this.name}: no techniques available` };

        for (const technique of this.techniques()) {
            if (options.signal?.aborted) {
                return failed({ reason: 'timeout', message: `${this.name}: run timed out`, methodTag: technique.tag });
            }

            logger.debug({ source: this.name, technique: technique.tag, terms: cleaned }, 'Trying technique');

            try {
                const hits = await technique.run(cleaned, { limit, signal: options.signal });
                const valid = hits.filter((hit) => this.accepts(technique, hit));

                logger.debug(
                    { source: this.name, technique: technique.tag, parsed: hits.length, valid: valid.length },
                    'Technique finished'
                );

                if (valid.length > 0) {
                    return {
                        ok: true,
                        methodTag: technique.tag,
                        records: valid.slice(0, limit).map((hit) => ({
                            ...hit,
                            sourceName: this.name,
                            methodTag: technique.tag,
                            searchTermsUsed: [...cleaned],
                        })),
                    };
                }

                lastFailure = {
                    reason: 'no-results',
                    message: `${this.name}: ${technique.tag} returned no valid records`,
                    methodTag: technique.tag,
                };
            } catch (error) {
                lastFailure = { ...classifyError(error), methodTag: technique.tag };
                logger.debug({ source: this.name, technique: technique.tag, failure: lastFailure }, 'Technique failed');

                if (lastFailure.reason === 'timeout' && options.signal?.aborted) {
                    break;
                }
            }
        }

        return failed(lastFailure);
    }

    private accepts(technique: SearchTechnique, hit: RawHit): boolean {
        if (technique.kind === 'scrape') {
            return isAcademic(hit.title, hit.abstract, hit.url);
        }
        return isStructurallyValid(hit);
    }
}

/**
 * Map any thrown value onto a failure reason.
 */
export function classifyError(error: unknown): Omit<AdapterFailure, 'methodTag'> {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof AdapterError) {
        return { reason: error.reason, message };
    }
    if (error instanceof HttpError) {
        if (error.timedOut) return { reason: 'timeout', message };
        return { reason: error.status > 0 ? 'http-status' : 'network', message };
    }
    if (error instanceof AbortedError) {
        return { reason: 'timeout', message };
    }
    if (error instanceof ResponseParseError || error instanceof z.ZodError) {
        return { reason: 'parse', message };
    }
    return { reason: 'network', message };
}

function failed(failure: AdapterFailure): SourceSearchResult {
    return { ok: false, records: [], methodTag: 'failed', failure };
}
