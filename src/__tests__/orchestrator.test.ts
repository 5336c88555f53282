import { describe, it, expect } from 'vitest';
import { runSearch } from '../search/orchestrator.js';
import { search } from '../search/search.js';
import { SourceRegistry, UnknownSourceError } from '../sources/registry.js';
import { candidate, failedWith, StubAdapter, succeeded } from './helpers.js';

const noWait = { delayRangeMs: [0, 0] as [number, number], sleep: async () => {} };

function recordsFor(terms: readonly string[], count: number, methodTag = 'stub_api') {
    return Array.from({ length: count }, (_, i) =>
        candidate({ title: `${terms.join(' ')} paper ${i + 1}`, methodTag, searchTermsUsed: [...terms] })
    );
}

describe('Fallback orchestrator', () => {
    it('should merge duplicate titles from one source into a single record', async () => {
        const adapter = new StubAdapter('Stub', () =>
            succeeded('stub_api', [
                candidate({ title: 'Exercise and Heart Failure Outcomes' }),
                candidate({ title: 'exercise and heart  failure OUTCOMES' }),
            ])
        );

        const { corpus, statistics, termSets } = await runSearch(['heart failure', 'exercise'], null, [adapter], noWait);

        expect(termSets.map((t) => t.terms)).toEqual([['heart failure', 'exercise']]);
        expect(corpus.records).toHaveLength(1);
        expect(statistics.successfulMethods).toEqual(['Stub:stub_api_keywords']);
        expect(statistics.successRate).toBe(1);
    });

    it('should report every source as failed when none returns records', async () => {
        const a = new StubAdapter('Alpha', () => failedWith('alpha_api'));
        const b = new StubAdapter('Beta', () => failedWith('beta_scrape', 'network'));

        const { corpus, statistics } = await runSearch(['sleep'], null, [a, b], noWait);

        expect(corpus.records).toEqual([]);
        expect([...statistics.failedMethods].sort()).toEqual(['Alpha:alpha_api', 'Beta:beta_scrape']);
        expect(statistics.successfulMethods).toEqual([]);
        expect(statistics.successRate).toBe(0);
    });

    it('should stop after the research question when it yields a third of the cap', async () => {
        const adapter = new StubAdapter('Stub', (terms) => succeeded('stub_api', recordsFor(terms, 3)));

        const { corpus, statistics } = await runSearch(['alpha', 'beta'], 'Does sleep improve memory?', [adapter], {
            ...noWait,
            maxResultsPerSource: 6,
        });

        expect(adapter.calls).toHaveLength(1);
        expect(corpus.records).toHaveLength(3);
        expect(statistics.successfulMethods).toEqual(['Stub:stub_api_research_question']);
    });

    it('should go on to keyword sets when the research question yields too little', async () => {
        const adapter = new StubAdapter('Stub', (terms, options) =>
            succeeded('stub_api', recordsFor(terms, terms.includes('alpha') ? options?.limit ?? 0 : 1))
        );

        const { corpus, statistics } = await runSearch(['alpha', 'beta'], 'Does sleep improve memory?', [adapter], {
            ...noWait,
            maxResultsPerSource: 6,
        });

        expect(adapter.calls).toEqual([
            ['sleep', 'improve', 'memory'],
            ['alpha', 'beta'],
        ]);
        expect(corpus.records).toHaveLength(6);
        expect(statistics.successfulMethods).toEqual(['Stub:stub_api_keywords']);
    });

    it('should cap records per source and stop once the cap is reached', async () => {
        const adapter = new StubAdapter('Stub', (terms) => succeeded('stub_api', recordsFor(terms, 10)));

        const { corpus } = await runSearch(['a1', 'b1', 'c1', 'd1'], null, [adapter], { ...noWait, maxResultsPerSource: 4 });

        expect(adapter.calls).toHaveLength(1);
        expect(corpus.records).toHaveLength(4);
    });

    it('should try the next term set after a failure', async () => {
        const adapter = new StubAdapter('Stub', (terms) =>
            terms.length === 4 ? failedWith('stub_api') : succeeded('stub_api', recordsFor(terms, 2))
        );

        const { statistics } = await runSearch(['a1', 'b1', 'c1', 'd1'], null, [adapter], noWait);

        expect(adapter.calls.map((terms) => terms.length)).toEqual([4, 3]);
        expect(statistics.successfulMethods).toEqual(['Stub:stub_api_keywords']);
    });

    it('should record adapters that throw as failures', async () => {
        const adapter = new StubAdapter('Thrower', () => {
            throw new Error('boom');
        });

        const { statistics } = await runSearch(['x1'], null, [adapter], noWait);

        expect(statistics.failedMethods).toEqual(['Thrower:failed']);
        expect(statistics.failures[0]?.message).toBe('boom');
    });

    it('should fail pending sources with timeout when the run ceiling passes', async () => {
        const slow = new StubAdapter(
            'Slow',
            (_terms, options) =>
                new Promise((resolve) => {
                    options?.signal?.addEventListener('abort', () => resolve(failedWith('slow_api', 'timeout')));
                })
        );
        const fast = new StubAdapter('Fast', (terms) => succeeded('fast_api', recordsFor(terms, 1)));

        const { statistics, corpus } = await runSearch(['x1'], null, [slow, fast], { ...noWait, runTimeoutMs: 20 });

        expect(statistics.failedMethods).toEqual(['Slow:none']);
        expect(statistics.failures[0]?.reason).toBe('timeout');
        expect(statistics.successfulMethods).toEqual(['Fast:fast_api_keywords']);
        expect(corpus.records).toHaveLength(1);
    });

    it('should abandon an adapter that never settles once the run ceiling passes', async () => {
        const hung = new StubAdapter('Hung', () => new Promise(() => {}));
        const fast = new StubAdapter('Fast', (terms) => succeeded('fast_api', recordsFor(terms, 2)));

        const { statistics, corpus } = await runSearch(['x1'], null, [hung, fast], { ...noWait, runTimeoutMs: 50 });

        expect(statistics.failedMethods).toEqual(['Hung:none']);
        expect(statistics.failures[0]?.reason).toBe('timeout');
        expect(statistics.failures[0]?.message).toBe('Hung: run timed out');
        expect(statistics.successfulMethods).toEqual(['Fast:fast_api_keywords']);
        expect(corpus.records).toHaveLength(2);
    });

    it('should keep the last technique tag when a later term set is abandoned', async () => {
        const adapter = new StubAdapter('Partial', (terms) =>
            terms.length === 4 ? failedWith('partial_api') : new Promise(() => {})
        );

        const { statistics } = await runSearch(['a1', 'b1', 'c1', 'd1'], null, [adapter], { ...noWait, runTimeoutMs: 50 });

        expect(adapter.calls).toEqual([
            ['a1', 'b1', 'c1', 'd1'],
            ['a1', 'b1', 'c1'],
        ]);
        expect(statistics.failedMethods).toEqual(['Partial:partial_api']);
        expect(statistics.failures[0]?.reason).toBe('timeout');
    });

    it('should pause between sources but not before the first', async () => {
        const pauses: number[] = [];
        const a = new StubAdapter('A', (terms) => succeeded('a_api', recordsFor(terms, 1)));
        const b = new StubAdapter('B', () => failedWith('b_api'));
        const c = new StubAdapter('C', () => failedWith('c_api'));

        await runSearch(['x1'], null, [a, b, c], {
            delayRangeMs: [100, 200],
            random: () => 0,
            sleep: async (ms) => {
                pauses.push(ms);
            },
        });

        expect(pauses).toEqual([100, 100]);
    });

    it('should search nothing without keywords or a question', async () => {
        const adapter = new StubAdapter('Stub', () => succeeded('stub_api', []));
        const { corpus, termSets } = await runSearch([' '], '  ', [adapter], noWait);

        expect(corpus.records).toEqual([]);
        expect(termSets).toEqual([]);
        expect(adapter.calls).toEqual([]);
    });

    it('should reject a source listed twice', async () => {
        const adapter = new StubAdapter('Stub', () => succeeded('stub_api', []));
        await expect(runSearch(['x1'], null, [adapter, adapter], noWait)).rejects.toThrow('Source listed twice: Stub');
    });
});

describe('search', () => {
    it('should resolve source names through the registry', async () => {
        const registry = new SourceRegistry().register(
            new StubAdapter('Named', (terms) => succeeded('named_api', recordsFor(terms, 2)))
        );

        const { corpus, statistics } = await search(['x1', 'y1'], null, ['Named'], { ...noWait, registry });

        expect(corpus.records).toHaveLength(2);
        expect(statistics.successfulMethods).toEqual(['Named:named_api_keywords']);
    });

    it('should accept adapter instances alongside names', async () => {
        const registry = new SourceRegistry().register(new StubAdapter('Named', () => failedWith('named_api')));
        const direct = new StubAdapter('Direct', (terms) => succeeded('direct_api', recordsFor(terms, 1)));

        const { statistics } = await search(['x1'], null, ['Named', direct], { ...noWait, registry });

        expect(statistics.has('Named')).toBe(true);
        expect(statistics.has('Direct')).toBe(true);
    });

    it('should reject unknown source names', async () => {
        await expect(search(['x1'], null, ['Nowhere'], { ...noWait, registry: new SourceRegistry() })).rejects.toBeInstanceOf(
            UnknownSourceError
        );
    });
});
