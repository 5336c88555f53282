import pLimit from 'p-limit';
import {
    DEFAULT_CONFIG,
    type AdapterFailure,
    type CandidateRecord,
    type Corpus,
    type SearchTermSet,
    type SourceAdapter,
    type SourceSearchResult,
} from '../types/index.js';
import { classifyError } from '../sources/base.js';
import { AbortedError, raceAbort, randomBetween, sleep } from '../utils/async.js';
import { getLogger } from '../utils/logger.js';
import { dedupe } from './deduplicator.js';
import { RunStatistics } from './statistics.js';
import { plan } from './term-planner.js';

export interface OrchestratorOptions {
    maxResultsPerSource?: number;
    /** Fraction of `maxResultsPerSource` at which research-question results end a source early */
    earlyExitRatio?: number;
    /** Sources searched at once; defaults to one worker per source */
    concurrency?: number;
    /** Random pause before each source after the first */
    delayRangeMs?: [number, number];
    /** Pending adapter calls past this ceiling fail with `timeout` */
    runTimeoutMs?: number;
    signal?: AbortSignal;
    random?: () => number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface SearchRun {
    corpus: Corpus;
    statistics: RunStatistics;
    termSets: SearchTermSet[];
    /** Records before deduplication, in source order */
    candidates: CandidateRecord[];
}

interface SourceRun {
    records: CandidateRecord[];
    method: string | null;
    failure: AdapterFailure | null;
}

/**
 * Drive every source through the planned term sets and deduplicate the results.
 *
 * Sources run in a bounded pool; term sets and adapter techniques within one
 * source stay sequential. Failures are recorded in the statistics, never thrown.
 */
export async function runSearch(
    keywords: readonly string[],
    researchQuestion: string | null | undefined,
    sources: readonly SourceAdapter[],
    options: OrchestratorOptions = {}
): Promise<SearchRun> {
    const logger = getLogger();
    const statistics = new RunStatistics();

    const hasKeywords = keywords.some((keyword) => keyword.trim().length > 0);
    if (!hasKeywords && !researchQuestion?.trim()) {
        logger.warn('No keywords or research question provided; nothing to search');
        return { corpus: { records: [] }, statistics, termSets: [], candidates: [] };
    }

    assertUniqueNames(sources);

    const termSets = plan(keywords, researchQuestion);
    const maxResults = options.maxResultsPerSource ?? DEFAULT_CONFIG.maxResultsPerSource;
    const earlyExitAt = Math.max(1, Math.floor(maxResults * (options.earlyExitRatio ?? DEFAULT_CONFIG.earlyExitRatio)));
    const delayRange = options.delayRangeMs ?? DEFAULT_CONFIG.delayRangeMs;
    const pause = options.sleep ?? sleep;
    const random = options.random ?? Math.random;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.runTimeoutMs ?? DEFAULT_CONFIG.runTimeoutMs);
    const onOuterAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onOuterAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    logger.info(
        { sources: sources.map((s) => s.name), termSets: termSets.map((t) => t.description) },
        `Starting search across ${sources.length} source(s) with ${termSets.length} term set(s)`
    );

    const limit = pLimit(Math.max(1, options.concurrency ?? sources.length));
    const runs: SourceRun[] = [];

    try {
        await Promise.all(
            sources.map((adapter, index) =>
                limit(async () => {
                    if (index > 0 && sources.length > 1) {
                        await interSourceDelay(pause, randomBetween(delayRange, random), controller.signal);
                    }

                    const run = await searchSource(adapter, termSets, maxResults, earlyExitAt, controller.signal);
                    runs[index] = run;

                    if (run.records.length > 0 && run.method) {
                        statistics.recordSuccess(adapter.name, run.method, run.records.length);
                        logger.info(
                            { source: adapter.name, method: run.method, count: run.records.length },
                            `${adapter.name}: found ${run.records.length} record(s)`
                        );
                    } else {
                        const failure: AdapterFailure = run.failure ?? { reason: 'no-results', message: 'No records found' };
                        statistics.recordFailure(adapter.name, failure.methodTag ?? 'none', failure);
                        logger.warn({ source: adapter.name, failure }, `${adapter.name}: no records from any search method`);
                    }
                })
            )
        );
    } finally {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onOuterAbort);
    }

    const candidates = runs.flatMap((run) => run.records);
    const corpus = dedupe(candidates);

    logger.info(
        {
            candidates: candidates.length,
            duplicates: candidates.length - corpus.records.length,
            successful: statistics.successfulMethods,
            failed: statistics.failedMethods,
            successRate: statistics.successRate,
        },
        `Search finished with ${corpus.records.length} unique record(s)`
    );

    return { corpus, statistics, termSets, candidates };
}

// ─── Private helpers ──────────────────────────────────────

/**
 * Try each term set in priority order, accumulating records up to the per-source cap.
 * A research-question set that reaches `earlyExitAt` records ends the source.
 */
async function searchSource(
    adapter: SourceAdapter,
    termSets: readonly SearchTermSet[],
    maxResults: number,
    earlyExitAt: number,
    signal: AbortSignal
): Promise<SourceRun> {
    const logger = getLogger();
    const records: CandidateRecord[] = [];
    let method: string | null = null;
    let failure: AdapterFailure | null = null;

    for (const termSet of termSets) {
        if (records.length >= maxResults) break;
        if (signal.aborted) {
            failure = { reason: 'timeout', message: `${adapter.name}: run timed out`, methodTag: failure?.methodTag };
            break;
        }

        logger.debug({ source: adapter.name, termSet: termSet.description }, 'Trying term set');

        let result: SourceSearchResult;
        try {
            result = await raceAbort(adapter.search(termSet.terms, { limit: maxResults - records.length, signal }), signal);
        } catch (error) {
            if (error instanceof AbortedError && signal.aborted) {
                // An adapter that ignores the signal is abandoned here
                failure = { reason: 'timeout', message: `${adapter.name}: run timed out`, methodTag: failure?.methodTag };
                break;
            }
            // Adapters outside this package may still throw
            failure = { ...classifyError(error), methodTag: 'failed' };
            continue;
        }

        if (!result.ok) {
            failure = result.failure;
            continue;
        }

        records.push(...result.records.slice(0, maxResults - records.length));
        method = `${result.methodTag}_${termSet.kind}`;

        if (termSet.kind === 'research_question' && records.length >= earlyExitAt) {
            logger.debug({ source: adapter.name, count: records.length }, 'Research question results sufficient, skipping keyword sets');
            break;
        }
    }

    return { records, method, failure };
}

async function interSourceDelay(
    pause: (ms: number, signal?: AbortSignal) => Promise<void>,
    ms: number,
    signal: AbortSignal
): Promise<void> {
    try {
        await pause(ms, signal);
    } catch (error) {
        // An aborted pause leaves the source to fail with `timeout`
        if (!(error instanceof AbortedError)) throw error;
    }
}

function assertUniqueNames(sources: readonly SourceAdapter[]): void {
    const seen = new Set<string>();
    for (const source of sources) {
        if (seen.has(source.name)) {
            throw new Error(`Source listed twice: ${source.name}`);
        }
        seen.add(source.name);
    }
}
