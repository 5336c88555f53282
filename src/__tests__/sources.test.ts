import { describe, it, expect } from 'vitest';
import { ArxivAdapter, parseArxivAtom } from '../sources/arxiv.js';
import { AdapterError } from '../sources/base.js';
import { CoreAdapter } from '../sources/core.js';
import { DuckDuckGoAcademicAdapter } from '../sources/duckduckgo.js';
import { GoogleScholarAdapter, parseScholarHtml } from '../sources/google-scholar.js';
import { OpenAlexAdapter, normalizeWork } from '../sources/openalex.js';
import { PubMedAdapter, parsePubMedXml } from '../sources/pubmed.js';
import { SemanticScholarAdapter } from '../sources/semantic-scholar.js';
import { SiteSearchAdapter, SITE_SEARCH_SOURCES } from '../sources/site-search.js';
import { createDefaultRegistry, SourceRegistry, UnknownSourceError } from '../sources/registry.js';
import { authorsFromByline, extractDoi, extractYear, formatAuthors, invertedIndexToText, stripDoiPrefix } from '../sources/utils.js';
import { buildWebQuery, parseDuckDuckGoHtml, resolveResultUrl } from '../sources/web-search.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { jsonResponse, readFixture, stubFetch, testHttpClient, textResponse } from './helpers.js';

describe('Source utilities', () => {
    it('should format author lists', () => {
        expect(formatAuthors([])).toBe('Unknown');
        expect(formatAuthors(['  Ada   Lovelace ', ''])).toBe('Ada Lovelace');
        expect(formatAuthors(['A1', 'B2', 'C3', 'D4', 'E5', 'F6'])).toBe('A1, B2, C3, D4, E5 et al.');
    });

    it('should extract the most recent plausible year', () => {
        expect(extractYear('Published 1998, revised 2004')).toBe(2004);
        expect(extractYear('Project 2999 roadmap')).toBeUndefined();
        expect(extractYear('no year here')).toBeUndefined();
    });

    it('should extract DOIs without trailing punctuation', () => {
        expect(extractDoi('see doi:10.1000/xyz123.')).toBe('10.1000/xyz123');
        expect(extractDoi('nothing')).toBeUndefined();
        expect(stripDoiPrefix('https://doi.org/10.1234/test')).toBe('10.1234/test');
    });

    it('should rebuild an abstract from an inverted index', () => {
        expect(invertedIndexToText({ world: [1], hello: [0], again: [2] })).toBe('hello world again');
        expect(invertedIndexToText(null)).toBeNull();
    });

    it('should read authors from a scholar byline', () => {
        expect(authorsFromByline('J Smith, A Doe… - Journal of Things, 2021 - example.org')).toEqual(['J Smith', 'A Doe']);
    });
});

describe('Web search helpers', () => {
    it('should build site-restricted queries from the first three terms', () => {
        expect(buildWebQuery(['sleep', 'memory', 'adults', 'ignored'], { sites: ['arxiv.org'] })).toBe(
            'sleep memory adults site:arxiv.org'
        );
        expect(buildWebQuery(['sleep'], { sites: ['a.org', 'b.org'], academicSuffix: true, prefix: 'scopus' })).toBe(
            'scopus sleep (site:a.org OR site:b.org) (research OR study OR analysis OR paper OR journal)'
        );
    });

    it('should unwrap DuckDuckGo redirect links', () => {
        expect(resolveResultUrl('//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.org%2Fpaper&rut=1')).toBe(
            'https://example.org/paper'
        );
        expect(resolveResultUrl('https://duckduckgo.com/y.js?ad=1')).toBe('');
        expect(resolveResultUrl('https://example.org/x')).toBe('https://example.org/x');
        expect(resolveResultUrl('javascript:void(0)')).toBe('');
    });

    it('should parse organic results and skip ads and repeated links', () => {
        expect(parseDuckDuckGoHtml(readFixture('duckduckgo.html'))).toEqual([
            {
                title: 'Sleep and memory consolidation: a review',
                url: 'https://pubmed.ncbi.nlm.nih.gov/123/',
                snippet: 'A 2019 review of sleep studies. doi:10.1000/sleep.1',
            },
            {
                title: 'Pillow coupon sale for everyone',
                url: 'https://www.example-shop.com/pillows',
                snippet: 'Buy two pillows, get a discount.',
            },
        ]);
    });

    it('should return nothing for a page without results', () => {
        expect(parseDuckDuckGoHtml('<html><body><p>No results.</p></body></html>')).toEqual([]);
    });
});

describe('Parsers', () => {
    it('should parse PubMed EFetch XML', () => {
        const hits = parsePubMedXml(readFixture('pubmed-efetch.xml'));

        expect(hits).toEqual([
            {
                title: 'Exercise training in chronic heart failure',
                authors: 'Jane Smith, Alan Doe',
                abstract: 'Exercise is recommended. Capacity improved.',
                url: 'https://pubmed.ncbi.nlm.nih.gov/31234567/',
                year: 2021,
                doi: '10.1000/hf.2021.7',
            },
            {
                title: 'Cardiac output at rest',
                authors: 'Unknown',
                abstract: '',
                url: 'https://pubmed.ncbi.nlm.nih.gov/30000001/',
                year: 1998,
            },
        ]);
    });

    it('should parse an arXiv Atom feed', () => {
        expect(parseArxivAtom(readFixture('arxiv-atom.xml'))).toEqual([
            {
                title: 'Graph Neural Networks for Molecules',
                authors: 'Ada Lovelace, Alan Turing',
                abstract: 'We study molecules.',
                url: 'http://arxiv.org/abs/2101.00001v1',
                year: 2021,
                doi: '10.5555/gnn.2021',
            },
        ]);
    });

    it('should parse Google Scholar result pages', () => {
        expect(parseScholarHtml(readFixture('scholar.html'))).toEqual([
            {
                title: 'Deep learning for protein folding',
                authors: 'J Smith, A Doe',
                abstract: 'We present a method for protein structure prediction.',
                url: 'https://www.nature.com/articles/s1',
                year: 2020,
            },
            {
                title: 'Transformer models in clinical text mining',
                authors: 'M Garcia',
                abstract: 'A systematic review. https://doi.org/10.1016/j.jbi.2018.01.002.',
                url: 'https://example.org/t',
                year: 2018,
                doi: '10.1016/j.jbi.2018.01.002',
            },
        ]);
    });

    it('should fall back to the display name and DOI link for OpenAlex works', () => {
        expect(
            normalizeWork({
                id: 'https://openalex.org/W1',
                doi: 'https://doi.org/10.1/w1',
                title: 'Raw title',
                display_name: 'Display  title',
                publication_year: 2022,
                primary_location: { landing_page_url: null },
                authorships: [{ author: { display_name: 'Ada Lovelace' } }],
            })
        ).toEqual({
            title: 'Display title',
            authors: 'Ada Lovelace',
            abstract: '',
            url: 'https://doi.org/10.1/w1',
            year: 2022,
            doi: '10.1/w1',
        });
    });
});

describe('Adapters', () => {
    it('should stamp Semantic Scholar records and drop structurally invalid ones', async () => {
        const urls: string[] = [];
        let apiKey: string | null = null;
        const fetchStub = stubFetch((url, init) => {
            urls.push(url);
            apiKey = new Headers(init?.headers).get('x-api-key');
            return jsonResponse({
                total: 3,
                data: [
                    {
                        paperId: 'abc',
                        title: 'Sleep and Memory',
                        year: 2020,
                        authors: [{ name: 'Jane Smith' }],
                        externalIds: { DOI: '10.1/abc', CorpusId: 42 },
                        abstract: null,
                        url: null,
                    },
                    { paperId: 'def', title: '', year: 2019 },
                    { paperId: 'ghi', title: 'Future Paper', year: 3000 },
                ],
            });
        });
        const adapter = new SemanticScholarAdapter({ httpClient: testHttpClient(fetchStub), apiKey: 'test-secret' });

        const result = await adapter.search(['sleep', 'memory']);

        expect(result).toEqual({
            ok: true,
            methodTag: 'semantic_scholar_api',
            records: [
                {
                    title: 'Sleep and Memory',
                    authors: 'Jane Smith',
                    abstract: '',
                    url: 'https://www.semanticscholar.org/paper/abc',
                    year: 2020,
                    doi: '10.1/abc',
                    sourceName: 'Semantic Scholar',
                    methodTag: 'semantic_scholar_api',
                    searchTermsUsed: ['sleep', 'memory'],
                },
            ],
        });
        expect(urls[0]).toContain('/paper/search?query=sleep+memory&limit=100');
        expect(apiKey).toBe('test-secret');
    });

    it('should report HTTP errors as a failure value', async () => {
        const adapter = new SemanticScholarAdapter({ httpClient: testHttpClient(stubFetch(() => textResponse('down', 500))) });

        const result = await adapter.search(['sleep']);

        expect(result.ok).toBe(false);
        expect(result.methodTag).toBe('failed');
        if (!result.ok) {
            expect(result.failure).toMatchObject({ reason: 'http-status', methodTag: 'semantic_scholar_api' });
        }
    });

    it('should report unexpected response shapes as parse failures', async () => {
        const adapter = new OpenAlexAdapter({ httpClient: testHttpClient(stubFetch(() => jsonResponse({ results: 'nope' }))) });

        const result = await adapter.search(['sleep']);

        expect(result.ok ? null : result.failure.reason).toBe('parse');
    });

    it('should refuse blank term lists', async () => {
        const adapter = new OpenAlexAdapter({ httpClient: testHttpClient(stubFetch(() => jsonResponse({ results: [] }))) });

        const result = await adapter.search(['  ', '']);

        expect(result.ok ? null : result.failure.reason).toBe('no-terms');
    });

    it('should send the OpenAlex polite-pool address', async () => {
        const urls: string[] = [];
        const fetchStub = stubFetch((url) => {
            urls.push(url);
            return jsonResponse({ results: [{ id: 'https://openalex.org/W9', display_name: 'Coral reef decline' }] });
        });
        const adapter = new OpenAlexAdapter({ httpClient: testHttpClient(fetchStub), email: 'team@example.org' });

        const result = await adapter.search(['coral']);

        expect(result.ok).toBe(true);
        expect(urls[0]).toBe('https://api.openalex.org/works?search=coral&per_page=100&mailto=team%40example.org');
    });

    it('should fail CORE without an API key', async () => {
        const fetchStub = stubFetch(() => jsonResponse({ results: [] }));
        const adapter = new CoreAdapter({ httpClient: testHttpClient(fetchStub) });

        const result = await adapter.search(['sleep']);

        expect(result.ok ? null : result.failure.reason).toBe('missing-api-key');
        expect(fetchStub).not.toHaveBeenCalled();
    });

    it('should chain PubMed ESearch and EFetch', async () => {
        const fetchStub = stubFetch((url) => {
            if (url.includes('esearch.fcgi')) return jsonResponse({ esearchresult: { idlist: ['31234567', '30000001'] } });
            return textResponse(readFixture('pubmed-efetch.xml'));
        });
        const adapter = new PubMedAdapter({ httpClient: testHttpClient(fetchStub) });

        const result = await adapter.search(['heart failure', 'exercise']);

        expect(result.ok && result.records.map((r) => r.title)).toEqual([
            'Exercise training in chronic heart failure',
            'Cardiac output at rest',
        ]);
        expect(fetchStub.mock.calls[1]?.[0]).toContain('efetch.fcgi?db=pubmed&id=31234567%2C30000001');
    });

    it('should not fetch articles when ESearch finds no ids', async () => {
        const fetchStub = stubFetch(() => jsonResponse({ esearchresult: { idlist: [] } }));
        const adapter = new PubMedAdapter({ httpClient: testHttpClient(fetchStub) });

        const result = await adapter.search(['nothing']);

        expect(result.ok ? null : result.failure).toMatchObject({ reason: 'no-results', methodTag: 'pubmed_api' });
        expect(fetchStub).toHaveBeenCalledTimes(1);
    });

    it('should fall back from the arXiv API to web search', async () => {
        const fetchStub = stubFetch((url) => {
            if (url.startsWith('http://export.arxiv.org')) return textResponse('unavailable', 503);
            return textResponse(readFixture('duckduckgo.html'));
        });
        const adapter = new ArxivAdapter({ httpClient: testHttpClient(fetchStub) });

        const result = await adapter.search(['sleep']);

        expect(result.ok && result.methodTag).toBe('arxiv_search');
        expect(result.ok && result.records.map((r) => r.title)).toEqual(['Sleep and memory consolidation: a review']);
    });

    it('should fall back from direct Google Scholar to DuckDuckGo', async () => {
        const fetchStub = stubFetch((url) => {
            if (url.startsWith('https://scholar.google.com')) return textResponse('captcha', 429);
            return textResponse(readFixture('duckduckgo.html'));
        });
        const adapter = new GoogleScholarAdapter({ httpClient: testHttpClient(fetchStub) });

        const result = await adapter.search(['sleep', 'memory']);

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.methodTag).toBe('duckduckgo_scholar');
            expect(result.records).toEqual([
                {
                    title: 'Sleep and memory consolidation: a review',
                    authors: 'Unknown',
                    abstract: 'A 2019 review of sleep studies. doi:10.1000/sleep.1',
                    url: 'https://pubmed.ncbi.nlm.nih.gov/123/',
                    year: 2019,
                    doi: '10.1000/sleep.1',
                    sourceName: 'Google Scholar',
                    methodTag: 'duckduckgo_scholar',
                    searchTermsUsed: ['sleep', 'memory'],
                },
            ]);
        }
    });

    it('should use Google Scholar results directly when the page parses', async () => {
        const adapter = new GoogleScholarAdapter({
            httpClient: testHttpClient(stubFetch(() => textResponse(readFixture('scholar.html')))),
        });

        const result = await adapter.search(['protein']);

        expect(result.ok && result.methodTag).toBe('direct_scholar');
        expect(result.ok && result.records).toHaveLength(2);
    });

    it('should drop non-academic DuckDuckGo hits', async () => {
        const adapter = new DuckDuckGoAcademicAdapter({
            httpClient: testHttpClient(stubFetch(() => textResponse(readFixture('duckduckgo.html')))),
        });

        const result = await adapter.search(['sleep'], { limit: 2 });

        expect(result.ok && result.records.map((r) => r.url)).toEqual(['https://pubmed.ncbi.nlm.nih.gov/123/']);
    });

    it('should run a site-search chain in order', async () => {
        const queries: string[] = [];
        const fetchStub = stubFetch((url) => {
            const query = new URL(url).searchParams.get('q') ?? '';
            queries.push(query);
            return textResponse(query.includes('site:nih.gov') ? readFixture('duckduckgo.html') : '<html></html>');
        });
        const plan = SITE_SEARCH_SOURCES['PubMed/MEDLINE'];
        if (!plan) throw new Error('PubMed/MEDLINE plan missing');
        const adapter = new SiteSearchAdapter('PubMed/MEDLINE', plan, { httpClient: testHttpClient(fetchStub) });

        const result = await adapter.search(['sleep']);

        expect(queries).toEqual(['sleep site:pubmed.ncbi.nlm.nih.gov', 'sleep site:nih.gov']);
        expect(result.ok && result.methodTag).toBe('nih_sites');
    });

    it('should put the source name before the terms in the universal general search', async () => {
        const queries: string[] = [];
        const fetchStub = stubFetch((url) => {
            queries.push(new URL(url).searchParams.get('q') ?? '');
            return textResponse('<html></html>');
        });
        const adapter = new SiteSearchAdapter('Web of Science', { mode: 'universal', domains: ['webofscience.com'] }, {
            httpClient: testHttpClient(fetchStub),
        });

        const result = await adapter.search(['sleep']);

        expect(queries).toEqual([
            'sleep site:webofscience.com (research OR study OR analysis OR paper OR journal)',
            'web sleep (site:scholar.google.com OR site:pubmed.ncbi.nlm.nih.gov OR site:arxiv.org OR site:researchgate.net OR site:sciencedirect.com OR site:springer.com) (research OR study OR analysis OR paper OR journal)',
        ]);
        expect(result.ok ? null : result.failure).toMatchObject({ reason: 'no-results', methodTag: 'universal_fallback_enhanced' });
    });

    it('should not let non-academic domain hits skip the universal general search', async () => {
        const shopOnly = `<html><body><div class="result results_links">
            <h2 class="result__title"><a class="result__a" href="https://www.example-shop.com/pillows">Pillow coupon sale for everyone</a></h2>
            <a class="result__snippet">Buy two pillows, get a discount.</a>
        </div></body></html>`;
        const queries: string[] = [];
        const fetchStub = stubFetch((url) => {
            const query = new URL(url).searchParams.get('q') ?? '';
            queries.push(query);
            return textResponse(query.includes('site:scopus.com') ? shopOnly : readFixture('duckduckgo.html'));
        });
        const adapter = new SiteSearchAdapter('Scopus', { mode: 'universal', domains: ['scopus.com'] }, {
            httpClient: testHttpClient(fetchStub),
        });

        const result = await adapter.search(['sleep'], { limit: 2 });

        expect(queries).toHaveLength(2);
        expect(result.ok && result.methodTag).toBe('universal_fallback_enhanced');
        expect(result.ok && result.records.map((r) => r.url)).toEqual(['https://pubmed.ncbi.nlm.nih.gov/123/']);
    });

    it('should report a universal search cut off before any sub-search as a timeout', async () => {
        class UniversalOnly extends SiteSearchAdapter {
            runFirstTechnique(terms: readonly string[], signal: AbortSignal) {
                const technique = this.techniques()[0];
                if (!technique) throw new Error('no technique');
                return technique.run(terms, { limit: 2, signal });
            }
        }
        const fetchStub = stubFetch(() => textResponse('<html></html>'));
        const adapter = new UniversalOnly('Scopus', { mode: 'universal', domains: ['scopus.com'] }, {
            httpClient: testHttpClient(fetchStub),
        });
        const controller = new AbortController();
        controller.abort();

        const error = await adapter.runFirstTechnique(['sleep'], controller.signal).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(AdapterError);
        expect(error instanceof AdapterError && error.reason).toBe('timeout');
        expect(fetchStub).not.toHaveBeenCalled();
    });
});

describe('SourceRegistry', () => {
    it('should register every built-in source', () => {
        expect(createDefaultRegistry(DEFAULT_CONFIG).list()).toEqual([
            'Semantic Scholar',
            'OpenAlex',
            'PubMed API',
            'CORE API',
            'arXiv',
            'Google Scholar',
            'DuckDuckGo Academic',
            'PubMed/MEDLINE',
            'ResearchGate',
            'Scopus',
            'Web of Science',
            'EMBASE',
            'PsycINFO',
        ]);
    });

    it('should name every unknown source at once', () => {
        const registry = createDefaultRegistry(DEFAULT_CONFIG);
        expect(() => registry.resolve(['arXiv', 'Nope', 'Nada'])).toThrow(UnknownSourceError);
        expect(() => registry.resolve(['Nope', 'Nada'])).toThrow(/Unknown source\(s\): Nope, Nada/);
    });

    it('should refuse duplicate registrations', () => {
        const registry = new SourceRegistry().register(new ArxivAdapter());
        expect(() => registry.register(new ArxivAdapter())).toThrow('Source already registered: arXiv');
    });
});
