import { getLogger } from '../utils/logger.js';
import { FallbackChainAdapter, type RawHit, type SearchTechnique, type TechniqueContext } from './base.js';
import { apiQueryTerms, formatAuthors, stripDoiPrefix } from './utils.js';
import { asArray, attribute, child, flattenText, parseXml } from './xml.js';
import { buildWebQuery, searchDuckDuckGo, webHitToRawHit } from './web-search.js';
import { collapseWhitespace } from '../nlp/tokenizer.js';

const ARXIV_API = 'http://export.arxiv.org/api/query';

/**
 * arXiv preprints: the Atom query API first, then a site-filtered web search.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivAdapter extends FallbackChainAdapter {
    readonly name = 'arXiv';
    readonly kind = 'api' as const;

    protected techniques(): readonly SearchTechnique[] {
        return [
            { tag: 'arxiv_api', kind: 'api', run: (terms, context) => this.searchAtom(terms, context) },
            { tag: 'arxiv_search', kind: 'scrape', run: (terms, context) => this.searchWeb(terms, context) },
        ];
    }

    private async searchAtom(terms: readonly string[], { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        const query = apiQueryTerms(terms)
            .map((term) => (/\s/.test(term) ? `all:"${term}"` : `all:${term}`))
            .join(' AND ');

        const params = new URLSearchParams({
            search_query: query,
            start: '0',
            max_results: String(Math.min(limit, 100)),
            sortBy: 'relevance',
            sortOrder: 'descending',
        });

        const url = `${ARXIV_API}?${params.toString()}`;
        getLogger().debug({ query }, 'arXiv Atom search');

        const xml = await this.httpClient.getText(url, { signal });
        return parseArxivAtom(xml);
    }

    private async searchWeb(terms: readonly string[], { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        const query = buildWebQuery(terms, { sites: ['arxiv.org'] });
        const hits = await searchDuckDuckGo(this.httpClient, query, { signal, limit });
        return hits.map((hit) => webHitToRawHit(hit));
    }
}

/**
 * Parse an arXiv Atom feed into raw hits.
 */
export function parseArxivAtom(xml: string): RawHit[] {
    const entries = asArray(child(parseXml(xml), 'feed', 'entry'));

    return entries.map((entry) => {
        const links = asArray(child(entry, 'link'));
        const absLink = links.find((link) => attribute(link, 'rel') === 'alternate');
        const id = flattenText(child(entry, 'id'));

        const hit: RawHit = {
            title: collapseWhitespace(flattenText(child(entry, 'title'))),
            authors: formatAuthors(asArray(child(entry, 'author')).map((author) => flattenText(child(author, 'name')))),
            abstract: collapseWhitespace(flattenText(child(entry, 'summary'))),
            url: (absLink && attribute(absLink, 'href')) || id,
        };

        const published = flattenText(child(entry, 'published')).match(/^(\d{4})/);
        if (published?.[1]) hit.year = parseInt(published[1], 10);
        const doi = stripDoiPrefix(flattenText(child(entry, 'arxiv:doi')));
        if (doi) hit.doi = doi;
        return hit;
    });
}
