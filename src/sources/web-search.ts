import * as cheerio from 'cheerio';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import type { RawHit } from './base.js';
import { UNKNOWN_AUTHORS } from '../types/index.js';
import { cleanSnippet, extractDoi, extractYear } from './utils.js';
import { collapseWhitespace } from '../nlp/tokenizer.js';

const DUCKDUCKGO_HTML = 'https://duckduckgo.com/html/';

/** Sites OR-ed together when a web search should stay on academic ground. */
export const ACADEMIC_SITES: readonly string[] = [
    'scholar.google.com',
    'pubmed.ncbi.nlm.nih.gov',
    'arxiv.org',
    'researchgate.net',
    'sciencedirect.com',
    'springer.com',
];

export const ACADEMIC_SUFFIX = '(research OR study OR analysis OR paper OR journal)';

/** Web queries only carry the leading terms; longer queries return nothing. */
export const WEB_QUERY_TERMS = 3;

// Markup has changed several times; the first selector that matches wins.
const CONTAINER_SELECTORS = ['div.result', 'div.web-result', 'div[class*="result"]', 'article', 'div.serp-result'];
const TITLE_SELECTORS = ['a.result__a', 'h3 a', 'h2 a', '.result-title a', '.result__title a', 'a[href]'];
const SNIPPET_SELECTORS = ['.result__snippet', '.result-snippet', '.snippet', '.description', '.result__body'];

/**
 * One organic web search result.
 */
export interface WebHit {
    title: string;
    url: string;
    snippet: string;
}

export interface WebQueryOptions {
    /** Restrict to these sites (`site:` filters, OR-ed when several) */
    sites?: readonly string[];
    /** Append the academic OR-suffix */
    academicSuffix?: boolean;
    /** Extra words placed before the terms */
    prefix?: string;
}

/**
 * Build a web search query from the leading terms.
 * - `buildWebQuery(['sleep', 'memory'], { sites: ['arxiv.org'] })` → `sleep memory site:arxiv.org`
 */
export function buildWebQuery(terms: readonly string[], options: WebQueryOptions = {}): string {
    const parts: string[] = [];
    if (options.prefix) parts.push(options.prefix);
    parts.push(terms.slice(0, WEB_QUERY_TERMS).join(' '));

    const sites = options.sites ?? [];
    if (sites.length === 1) {
        parts.push(`site:${sites[0]}`);
    } else if (sites.length > 1) {
        parts.push(`(${sites.map((site) => `site:${site}`).join(' OR ')})`);
    }

    if (options.academicSuffix) parts.push(ACADEMIC_SUFFIX);
    return parts.join(' ');
}

/**
 * Run a query against DuckDuckGo's HTML endpoint and parse the organic results.
 */
export async function searchDuckDuckGo(
    http: HttpClient,
    query: string,
    options: { signal?: AbortSignal; limit?: number } = {}
): Promise<WebHit[]> {
    const url = `${DUCKDUCKGO_HTML}?q=${encodeURIComponent(query)}`;
    getLogger().debug({ query }, 'DuckDuckGo search');

    const html = await http.getText(url, {
        signal: options.signal,
        headers: { Accept: 'text/html,application/xhtml+xml' },
    });

    const hits = parseDuckDuckGoHtml(html);
    return options.limit !== undefined ? hits.slice(0, options.limit) : hits;
}

/**
 * Parse a DuckDuckGo HTML result page. Ads and duplicate URLs are skipped.
 */
export function parseDuckDuckGoHtml(html: string): WebHit[] {
    const $ = cheerio.load(html);
    const containerSelector = CONTAINER_SELECTORS.find((selector) => $(selector).length > 0);
    if (!containerSelector) return [];

    const hits: WebHit[] = [];
    const seen = new Set<string>();

    $(containerSelector).each((_, element) => {
        const container = $(element);
        if (container.hasClass('result--ad')) return;

        const link = TITLE_SELECTORS.map((selector) => container.find(selector).first()).find((found) => found.length > 0);
        if (!link) return;

        const url = resolveResultUrl(link.attr('href') ?? '');
        const title = collapseWhitespace(link.text());
        if (!url || !title || seen.has(url)) return;

        const snippetNode = SNIPPET_SELECTORS.map((selector) => container.find(selector).first()).find(
            (found) => found.length > 0
        );

        seen.add(url);
        hits.push({ title, url, snippet: snippetNode ? collapseWhitespace(snippetNode.text()) : '' });
    });

    return hits;
}

/**
 * DuckDuckGo wraps result links in a redirect (`//duckduckgo.com/l/?uddg=<target>`).
 * Returns the target URL, or '' for ads and non-http links.
 */
export function resolveResultUrl(href: string): string {
    if (!href) return '';
    const absolute = href.startsWith('//') ? `https:${href}` : href;

    let parsed: URL;
    try {
        parsed = new URL(absolute, 'https://duckduckgo.com');
    } catch {
        return '';
    }

    if (parsed.hostname.endsWith('duckduckgo.com')) {
        const target = parsed.searchParams.get('uddg');
        if (!target || parsed.pathname.startsWith('/y.js')) return '';
        return target.startsWith('http') ? target : '';
    }

    return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed.toString() : '';
}

/**
 * Turn a web hit into a raw record. Authors are not available from result pages.
 */
export function webHitToRawHit(hit: WebHit): RawHit {
    const context = `${hit.title} ${hit.snippet}`;
    const raw: RawHit = {
        title: hit.title,
        authors: UNKNOWN_AUTHORS,
        abstract: cleanSnippet(hit.snippet),
        url: hit.url,
    };

    const year = extractYear(context);
    if (year !== undefined) raw.year = year;
    const doi = extractDoi(`${hit.snippet} ${hit.url}`);
    if (doi !== undefined) raw.doi = doi;
    return raw;
}
