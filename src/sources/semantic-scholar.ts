import { z } from 'zod';
import type { SourceAdapterOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { FallbackChainAdapter, type RawHit, type SearchTechnique, type TechniqueContext } from './base.js';
import { apiQueryTerms, formatAuthors, stripDoiPrefix } from './utils.js';
import { collapseWhitespace } from '../nlp/tokenizer.js';

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';

/** Fields to request from S2 API */
const PAPER_FIELDS = [
    'title', 'url', 'abstract', 'authors', 'year', 'venue',
    'citationCount', 'referenceCount', 'externalIds',
].join(',');

/**
 * Semantic Scholar search response (subset of relevant fields).
 */
const S2PaperSchema = z.object({
    paperId: z.string(),
    title: z.string().nullish(),
    url: z.string().nullish(),
    abstract: z.string().nullish(),
    year: z.number().int().nullish(),
    venue: z.string().nullish(),
    authors: z.array(z.object({ name: z.string().nullish() })).nullish(),
    externalIds: z.record(z.union([z.string(), z.number()])).nullish(),
});

const S2SearchResponseSchema = z.object({
    total: z.number().optional(),
    data: z.array(S2PaperSchema).default([]),
});

export type S2Paper = z.infer<typeof S2PaperSchema>;

/**
 * Semantic Scholar source adapter (Graph API keyword search).
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter extends FallbackChainAdapter {
    readonly name = 'Semantic Scholar';
    readonly kind = 'api' as const;
    private readonly apiKey?: string;

    constructor(options?: SourceAdapterOptions & { httpClient?: HttpClient }) {
        super(options);
        this.apiKey = options?.apiKey;
    }

    protected techniques(): readonly SearchTechnique[] {
        return [{ tag: 'semantic_scholar_api', kind: 'api', run: (terms, context) => this.searchApi(terms, context) }];
    }

    private async searchApi(terms: readonly string[], { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        const params = new URLSearchParams({
            query: this.cleanSearchQuery(apiQueryTerms(terms).join(' ')),
            limit: String(Math.min(limit, 100)),
            fields: PAPER_FIELDS,
        });

        const url = `${S2_BASE}/paper/search?${params.toString()}`;
        getLogger().debug({ url }, 'S2 keyword search');

        const body = await this.httpClient.getJson(url, { signal, headers: this.buildHeaders() });
        const response = S2SearchResponseSchema.parse(body);
        return response.data.map((paper) => normalizeS2Paper(paper));
    }

    /**
     * Clean search query; S2 treats hyphens and plus signs as operators.
     */
    private cleanSearchQuery(query: string): string {
        return collapseWhitespace(query.replace(/[-+]/g, ' '));
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return headers;
    }
}

export function normalizeS2Paper(paper: S2Paper): RawHit {
    const rawDoi = paper.externalIds?.['DOI'];
    const doi = stripDoiPrefix(typeof rawDoi === 'string' ? rawDoi : null);

    const hit: RawHit = {
        title: collapseWhitespace(paper.title ?? ''),
        authors: formatAuthors((paper.authors ?? []).map((author) => author.name ?? '')),
        abstract: paper.abstract ?? '',
        url: paper.url || `https://www.semanticscholar.org/paper/${paper.paperId}`,
    };
    if (paper.year) hit.year = paper.year;
    if (doi) hit.doi = doi;
    return hit;
}
