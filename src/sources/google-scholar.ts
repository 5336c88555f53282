import * as cheerio from 'cheerio';
import { getLogger } from '../utils/logger.js';
import { FallbackChainAdapter, type RawHit, type SearchTechnique, type TechniqueContext } from './base.js';
import { authorsFromByline, cleanSnippet, extractDoi, extractYear, formatAuthors } from './utils.js';
import { ACADEMIC_SITES, buildWebQuery, searchDuckDuckGo, webHitToRawHit, WEB_QUERY_TERMS } from './web-search.js';
import { collapseWhitespace } from '../nlp/tokenizer.js';

const SCHOLAR_URL = 'https://scholar.google.com/scholar';

/**
 * Google Scholar has no API. Tries the result page directly, then DuckDuckGo restricted
 * to scholar.google.com, then a broad academic-sites search.
 */
export class GoogleScholarAdapter extends FallbackChainAdapter {
    readonly name = 'Google Scholar';
    readonly kind = 'scrape' as const;

    protected techniques(): readonly SearchTechnique[] {
        return [
            { tag: 'direct_scholar', kind: 'scrape', run: (terms, context) => this.searchDirect(terms, context) },
            {
                tag: 'duckduckgo_scholar',
                kind: 'scrape',
                run: (terms, context) => this.searchWeb(buildWebQuery(terms, { sites: ['scholar.google.com'] }), context),
            },
            {
                tag: 'academic_terms',
                kind: 'scrape',
                run: (terms, context) =>
                    this.searchWeb(
                        buildWebQuery([`${terms.slice(0, 2).join(' ')} research study paper`], {
                            sites: ACADEMIC_SITES,
                            academicSuffix: true,
                        }),
                        context
                    ),
            },
        ];
    }

    private async searchDirect(terms: readonly string[], { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        const query = terms.slice(0, WEB_QUERY_TERMS).join(' ');
        const url = `${SCHOLAR_URL}?q=${encodeURIComponent(query)}&hl=en&as_sdt=0%2C5`;
        getLogger().debug({ query }, 'Google Scholar direct search');

        const html = await this.httpClient.getText(url, {
            signal,
            headers: { Accept: 'text/html,application/xhtml+xml' },
        });
        return parseScholarHtml(html).slice(0, limit);
    }

    private async searchWeb(query: string, { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        const hits = await searchDuckDuckGo(this.httpClient, query, { signal, limit });
        return hits.map((hit) => webHitToRawHit(hit));
    }
}

/**
 * Parse a Google Scholar result page.
 * Each result has a title (`h3.gs_rt`), a byline (`div.gs_a`) and a snippet (`div.gs_rs`).
 */
export function parseScholarHtml(html: string): RawHit[] {
    const $ = cheerio.load(html);
    let containers = $('div.gs_ri');
    if (containers.length === 0) containers = $('div.gs_r');

    const hits: RawHit[] = [];
    containers.each((_, element) => {
        const container = $(element);
        const heading = container.find('h3.gs_rt').first();
        // "[PDF]" / "[HTML]" / "[CITATION]" markers
        heading.find('span.gs_ct1, span.gs_ct2, span.gs_ctc, span.gs_ctg2').remove();

        const link = heading.length > 0 ? heading.find('a').first() : container.find('a').first();
        const title = collapseWhitespace(heading.length > 0 ? heading.text() : link.text());
        if (!title) return;

        const snippet = collapseWhitespace(container.find('div.gs_rs').first().text());
        const byline = collapseWhitespace(container.find('div.gs_a').first().text());

        const hit: RawHit = {
            title,
            authors: formatAuthors(authorsFromByline(byline)),
            abstract: cleanSnippet(snippet),
            url: link.attr('href') ?? '',
        };

        const year = extractYear(`${title} ${snippet} ${byline}`);
        if (year !== undefined) hit.year = year;
        const doi = extractDoi(`${snippet} ${byline}`);
        if (doi !== undefined) hit.doi = doi;
        hits.push(hit);
    });

    return hits;
}
