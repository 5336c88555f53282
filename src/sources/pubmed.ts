import { z } from 'zod';
import type { SourceAdapterOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { FallbackChainAdapter, type RawHit, type SearchTechnique, type TechniqueContext } from './base.js';
import { apiQueryTerms, formatAuthors } from './utils.js';
import { asArray, attribute, child, flattenText, parseXml } from './xml.js';
import { collapseWhitespace } from '../nlp/tokenizer.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/** PubMed lists can run to hundreds of authors. */
const MAX_PUBMED_AUTHORS = 10;

const ESearchResponseSchema = z.object({
    esearchresult: z.object({
        idlist: z.array(z.string()).default([]),
    }),
});

/**
 * PubMed via NCBI E-utilities: ESearch for PMIDs, then EFetch for the articles.
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25501/
 */
export class PubMedAdapter extends FallbackChainAdapter {
    readonly name = 'PubMed API';
    readonly kind = 'api' as const;
    private readonly apiKey?: string;

    constructor(options?: SourceAdapterOptions & { httpClient?: HttpClient }) {
        super(options);
        this.apiKey = options?.apiKey;
    }

    protected techniques(): readonly SearchTechnique[] {
        return [{ tag: 'pubmed_api', kind: 'api', run: (terms, context) => this.searchEutils(terms, context) }];
    }

    private async searchEutils(terms: readonly string[], { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        const logger = getLogger();
        const searchParams = new URLSearchParams({
            db: 'pubmed',
            term: apiQueryTerms(terms)
                .map((term) => `"${term}"`)
                .join(' AND '),
            retmax: String(Math.min(limit, 100)),
            retmode: 'json',
        });
        this.addApiKey(searchParams);

        const searchUrl = `${EUTILS_BASE}/esearch.fcgi?${searchParams.toString()}`;
        logger.debug({ url: searchUrl }, 'PubMed ESearch');

        const searchBody = await this.httpClient.getJson(searchUrl, { signal });
        const pmids = ESearchResponseSchema.parse(searchBody).esearchresult.idlist;
        if (pmids.length === 0) {
            return [];
        }

        const fetchParams = new URLSearchParams({
            db: 'pubmed',
            id: pmids.join(','),
            retmode: 'xml',
            rettype: 'abstract',
        });
        this.addApiKey(fetchParams);

        const fetchUrl = `${EUTILS_BASE}/efetch.fcgi?${fetchParams.toString()}`;
        logger.debug({ url: fetchUrl, count: pmids.length }, 'PubMed EFetch');

        const xml = await this.httpClient.getText(fetchUrl, { signal });
        return parsePubMedXml(xml);
    }

    private addApiKey(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
    }
}

/**
 * Parse an EFetch `PubmedArticleSet` document.
 */
export function parsePubMedXml(xml: string): RawHit[] {
    const articles = asArray(child(parseXml(xml), 'PubmedArticleSet', 'PubmedArticle'));
    return articles.map((entry) => extractArticle(entry));
}

// ─── Private helpers ──────────────────────────────────────

function extractArticle(entry: unknown): RawHit {
    const citation = child(entry, 'MedlineCitation');
    const article = child(citation, 'Article');
    const pmid = flattenText(child(citation, 'PMID'));

    const hit: RawHit = {
        title: collapseWhitespace(flattenText(child(article, 'ArticleTitle'))),
        authors: formatPubMedAuthors(child(article, 'AuthorList', 'Author')),
        abstract: collapseWhitespace(
            asArray(child(article, 'Abstract', 'AbstractText'))
                .map((part) => flattenText(part))
                .join(' ')
        ),
        url: pmid ? `https://pubmed.ncbi.nlm.nih.gov/${pmid}/` : '',
    };

    const year = extractPubMedYear(article);
    if (year !== undefined) hit.year = year;
    const doi = extractPubMedDoi(entry);
    if (doi) hit.doi = doi;
    return hit;
}

function formatPubMedAuthors(authorNodes: unknown): string {
    const names = asArray(authorNodes)
        .slice(0, MAX_PUBMED_AUTHORS)
        .map((author) => {
            const last = flattenText(child(author, 'LastName'));
            const fore = flattenText(child(author, 'ForeName'));
            return last && fore ? `${fore} ${last}` : last;
        })
        .filter((name) => name.length > 0);

    // formatAuthors applies its own shorter cap; PubMed keeps its ten names
    return names.length > 0 ? names.join(', ') : formatAuthors([]);
}

function extractPubMedYear(article: unknown): number | undefined {
    const candidates = [
        child(article, 'Journal', 'JournalIssue', 'PubDate', 'Year'),
        child(article, 'Journal', 'JournalIssue', 'PubDate', 'MedlineDate'),
        child(asArray(child(article, 'ArticleDate'))[0], 'Year'),
    ];

    for (const candidate of candidates) {
        const match = flattenText(candidate).match(/(\d{4})/);
        if (match?.[1]) return parseInt(match[1], 10);
    }
    return undefined;
}

function extractPubMedDoi(entry: unknown): string | undefined {
    const ids = asArray(child(entry, 'PubmedData', 'ArticleIdList', 'ArticleId'));
    const doiNode = ids.find((id) => attribute(id, 'IdType') === 'doi');
    const doi = doiNode === undefined ? '' : flattenText(doiNode);
    return doi || undefined;
}
