import { z } from 'zod';
import type { SourceAdapterOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { FallbackChainAdapter, type RawHit, type SearchTechnique, type TechniqueContext } from './base.js';
import { apiQueryTerms, formatAuthors, invertedIndexToText, stripDoiPrefix } from './utils.js';
import { collapseWhitespace } from '../nlp/tokenizer.js';

const OPENALEX_BASE = 'https://api.openalex.org';

/**
 * OpenAlex work (subset of relevant fields).
 */
const OpenAlexWorkSchema = z.object({
    id: z.string(),
    doi: z.string().nullish(),
    title: z.string().nullish(),
    display_name: z.string().nullish(),
    publication_year: z.number().int().nullish(),
    abstract_inverted_index: z.record(z.array(z.number())).nullish(),
    primary_location: z
        .object({
            landing_page_url: z.string().nullish(),
        })
        .nullish(),
    authorships: z
        .array(z.object({ author: z.object({ display_name: z.string().nullish() }).nullish() }))
        .nullish(),
});

const OpenAlexSearchResponseSchema = z.object({
    meta: z.object({ count: z.number() }).partial().optional(),
    results: z.array(OpenAlexWorkSchema),
});

export type OpenAlexWork = z.infer<typeof OpenAlexWorkSchema>;

/**
 * OpenAlex source adapter.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexAdapter extends FallbackChainAdapter {
    readonly name = 'OpenAlex';
    readonly kind = 'api' as const;
    private readonly apiKey?: string;
    private readonly email?: string;

    constructor(options?: SourceAdapterOptions & { httpClient?: HttpClient }) {
        super(options);
        this.apiKey = options?.apiKey;
        this.email = options?.email;
    }

    protected techniques(): readonly SearchTechnique[] {
        return [{ tag: 'openalex_api', kind: 'api', run: (terms, context) => this.searchWorks(terms, context) }];
    }

    private async searchWorks(terms: readonly string[], { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        const params = new URLSearchParams({
            search: apiQueryTerms(terms).join(' '),
            per_page: String(Math.min(limit, 200)),
        });

        this.addAuthParams(params);

        const url = `${OPENALEX_BASE}/works?${params.toString()}`;
        getLogger().debug({ url }, 'OpenAlex works search');

        const body = await this.httpClient.getJson(url, { signal });
        return OpenAlexSearchResponseSchema.parse(body).results.map((work) => normalizeWork(work));
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}

export function normalizeWork(work: OpenAlexWork): RawHit {
    const doi = stripDoiPrefix(work.doi);

    const hit: RawHit = {
        title: collapseWhitespace(work.display_name ?? work.title ?? ''),
        authors: formatAuthors((work.authorships ?? []).map((a) => a.author?.display_name ?? '')),
        abstract: invertedIndexToText(work.abstract_inverted_index) ?? '',
        url: work.primary_location?.landing_page_url ?? (doi ? `https://doi.org/${doi}` : work.id),
    };
    if (work.publication_year) hit.year = work.publication_year;
    if (doi) hit.doi = doi;
    return hit;
}
