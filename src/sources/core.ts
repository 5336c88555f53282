import { z } from 'zod';
import type { SourceAdapterOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { AdapterError, FallbackChainAdapter, type RawHit, type SearchTechnique, type TechniqueContext } from './base.js';
import { apiQueryTerms, formatAuthors, stripDoiPrefix } from './utils.js';
import { collapseWhitespace } from '../nlp/tokenizer.js';

const CORE_SEARCH_URL = 'https://api.core.ac.uk/v3/search/works';

const CoreWorkSchema = z.object({
    title: z.string().nullish(),
    abstract: z.string().nullish(),
    authors: z.array(z.object({ name: z.string().nullish() })).nullish(),
    yearPublished: z.number().int().nullish(),
    doi: z.string().nullish(),
    downloadUrl: z.string().nullish(),
});

const CoreSearchResponseSchema = z.object({
    totalHits: z.number().optional(),
    results: z.array(CoreWorkSchema).default([]),
});

export type CoreWork = z.infer<typeof CoreWorkSchema>;

/**
 * CORE open-access aggregator. Requires an API key.
 *
 * @see https://api.core.ac.uk/docs/v3
 */
export class CoreAdapter extends FallbackChainAdapter {
    readonly name = 'CORE API';
    readonly kind = 'api' as const;
    private readonly apiKey?: string;

    constructor(options?: SourceAdapterOptions & { httpClient?: HttpClient }) {
        super(options);
        this.apiKey = options?.apiKey;
    }

    protected techniques(): readonly SearchTechnique[] {
        return [{ tag: 'core_api', kind: 'api', run: (terms, context) => this.searchWorks(terms, context) }];
    }

    private async searchWorks(terms: readonly string[], { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        if (!this.apiKey) {
            throw new AdapterError('missing-api-key', 'CORE API key not configured (set CORE_API_KEY)');
        }

        const params = new URLSearchParams({
            q: apiQueryTerms(terms)
                .map((term) => `title:"${term}"`)
                .join(' AND '),
            limit: String(Math.min(limit, 100)),
            apiKey: this.apiKey,
        });

        const url = `${CORE_SEARCH_URL}?${params.toString()}`;
        getLogger().debug({ query: params.get('q') }, 'CORE works search');

        const body = await this.httpClient.getJson(url, { signal });
        return CoreSearchResponseSchema.parse(body).results.map((work) => normalizeCoreWork(work));
    }
}

export function normalizeCoreWork(work: CoreWork): RawHit {
    const doi = stripDoiPrefix(work.doi);

    const hit: RawHit = {
        title: collapseWhitespace(work.title ?? ''),
        authors: formatAuthors((work.authors ?? []).map((author) => author.name ?? '')),
        abstract: collapseWhitespace(work.abstract ?? ''),
        url: work.downloadUrl || (doi ? `https://doi.org/${doi}` : ''),
    };
    if (work.yearPublished) hit.year = work.yearPublished;
    if (doi) hit.doi = doi;
    return hit;
}
