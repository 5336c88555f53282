import { getLogger } from '../utils/logger.js';
import { AdapterError, FallbackChainAdapter, type RawHit, type SearchTechnique, type TechniqueContext } from './base.js';
import { ACADEMIC_SITES, buildWebQuery, searchDuckDuckGo, webHitToRawHit } from './web-search.js';
import type { HttpClient } from '../utils/http-client.js';
import type { SourceAdapterOptions } from '../types/index.js';
import { normalizeTitle } from './utils.js';
import { isAcademic } from '../validation/academic-filter.js';

/**
 * How a site-restricted source is searched.
 * - `chain`: one technique per entry, each a `site:` search, tried in order
 * - `universal`: one technique that walks the mapped domains and then a general academic search
 */
export type SiteSearchPlan =
    | { mode: 'chain'; steps: ReadonlyArray<{ tag: string; site: string }> }
    | { mode: 'universal'; domains: readonly string[] };

/**
 * Sources reached only through site-restricted web search.
 */
export const SITE_SEARCH_SOURCES: Readonly<Record<string, SiteSearchPlan>> = {
    'PubMed/MEDLINE': {
        mode: 'chain',
        steps: [
            { tag: 'duckduckgo_pubmed', site: 'pubmed.ncbi.nlm.nih.gov' },
            { tag: 'nih_sites', site: 'nih.gov' },
        ],
    },
    ResearchGate: { mode: 'universal', domains: ['researchgate.net'] },
    Scopus: { mode: 'universal', domains: ['scopus.com'] },
    'Web of Science': { mode: 'universal', domains: ['webofknowledge.com', 'webofscience.com'] },
    EMBASE: { mode: 'universal', domains: ['embase.com'] },
    PsycINFO: { mode: 'universal', domains: ['psycnet.apa.org'] },
};

/**
 * Adapter for a source without an API of its own, searched through DuckDuckGo `site:` filters.
 */
export class SiteSearchAdapter extends FallbackChainAdapter {
    readonly kind = 'scrape' as const;

    constructor(
        readonly name: string,
        private readonly plan: SiteSearchPlan,
        options?: SourceAdapterOptions & { httpClient?: HttpClient }
    ) {
        super(options);
    }

    protected techniques(): readonly SearchTechnique[] {
        if (this.plan.mode === 'chain') {
            return this.plan.steps.map(({ tag, site }) => ({
                tag,
                kind: 'scrape' as const,
                run: (terms: readonly string[], context: TechniqueContext) =>
                    this.searchQuery(buildWebQuery(terms, { sites: [site] }), context),
            }));
        }

        const domains = this.plan.domains;
        return [
            {
                tag: 'universal_fallback_enhanced',
                kind: 'scrape',
                run: (terms, context) => this.searchUniversal(terms, domains, context),
            },
        ];
    }

    private async searchQuery(query: string, { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        const hits = await searchDuckDuckGo(this.httpClient, query, { signal, limit });
        return hits.map((hit) => webHitToRawHit(hit));
    }

    /**
     * Each mapped domain in turn until half the limit is reached, then a general academic
     * search carrying the source's first word. Only academic hits count toward the target.
     * A failed sub-search is skipped unless every one fails.
     */
    private async searchUniversal(
        terms: readonly string[],
        domains: readonly string[],
        context: TechniqueContext
    ): Promise<RawHit[]> {
        const logger = getLogger();
        const target = Math.max(1, Math.floor(context.limit / 2));
        const queries = domains.map((domain) => buildWebQuery(terms, { sites: [domain], academicSuffix: true }));
        const general = buildWebQuery(terms, {
            prefix: this.name.split(/\s+/)[0]?.toLowerCase(),
            sites: ACADEMIC_SITES,
            academicSuffix: true,
        });

        const collected: RawHit[] = [];
        const seenTitles = new Set<string>();
        const failures: unknown[] = [];
        let attempts = 0;

        const attempt = async (query: string): Promise<void> => {
            try {
                const hits = await this.searchQuery(query, context);
                for (const hit of hits) {
                    if (!isAcademic(hit.title, hit.abstract, hit.url)) continue;
                    const key = normalizeTitle(hit.title);
                    if (key && !seenTitles.has(key)) {
                        seenTitles.add(key);
                        collected.push(hit);
                    }
                }
            } catch (error) {
                failures.push(error);
                logger.debug({ source: this.name, query, error }, 'Universal fallback sub-search failed');
            }
        };

        for (const query of queries) {
            if (collected.length >= target || context.signal?.aborted) break;
            attempts++;
            await attempt(query);
        }
        if (collected.length < target && !context.signal?.aborted) {
            attempts++;
            await attempt(general);
        }

        if (attempts === 0) {
            throw new AdapterError('timeout', `${this.name}: run timed out`);
        }
        if (failures.length === attempts) {
            throw failures[failures.length - 1];
        }
        return collected.slice(0, context.limit);
    }
}
