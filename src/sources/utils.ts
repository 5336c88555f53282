/**
 * Shared utilities for source adapters.
 */
import { UNKNOWN_AUTHORS } from '../types/index.js';
import { collapseWhitespace } from '../nlp/tokenizer.js';

/** Scraped snippets are cut to this many characters. */
export const SNIPPET_MAX_LENGTH = 500;

/** Author lists longer than this are truncated with "et al.". */
export const MAX_LISTED_AUTHORS = 5;

/**
 * Reconstruct abstract text from OpenAlex inverted index format.
 *
 * OpenAlex stores abstracts as inverted indexes: { "word": [position1, position2], ... }
 * This function reconstructs the original text.
 *
 * @returns Reconstructed abstract text or null
 */
export function invertedIndexToText(
    invertedIndex: Record<string, number[]> | null | undefined
): string | null {
    if (!invertedIndex) {
        return null;
    }

    const words: Array<[number, string]> = [];
    for (const [word, positions] of Object.entries(invertedIndex)) {
        for (const pos of positions) {
            if (pos >= 0) {
                words.push([pos, word]);
            }
        }
    }

    if (words.length === 0) return null;

    words.sort((a, b) => a[0] - b[0]);
    return words.map(([, word]) => word).join(' ');
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | undefined {
    if (!doi) return undefined;
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim() || undefined;
}

/**
 * Find the first DOI in free text, without trailing punctuation.
 * "see doi:10.1000/xyz123." → "10.1000/xyz123"
 */
export function extractDoi(text: string): string | undefined {
    const match = text.match(/10\.\d{4,}\/[^\s"<>]+/);
    if (!match) return undefined;
    return match[0].replace(/[.,;:)\]]+$/, '');
}

/**
 * Most recent 19xx/20xx year mentioned in the text.
 */
export function extractYear(text: string): number | undefined {
    const ceiling = new Date().getFullYear() + 1;
    const years = (text.match(/\b(19\d{2}|20\d{2})\b/g) ?? [])
        .map((y) => parseInt(y, 10))
        .filter((y) => y <= ceiling);
    return years.length > 0 ? Math.max(...years) : undefined;
}

/**
 * Join author names for display: up to five, then "et al.".
 * An empty list yields the "Unknown" sentinel.
 */
export function formatAuthors(names: readonly string[]): string {
    const cleaned = names.map((name) => collapseWhitespace(name)).filter((name) => name.length > 0);
    if (cleaned.length === 0) return UNKNOWN_AUTHORS;

    const listed = cleaned.slice(0, MAX_LISTED_AUTHORS).join(', ');
    return cleaned.length > MAX_LISTED_AUTHORS ? `${listed} et al.` : listed;
}

/**
 * Pull the author segment out of a scholar-style byline:
 * "J Smith, A Doe - Journal of Things, 2021 - example.org" → ["J Smith", "A Doe"]
 */
export function authorsFromByline(byline: string): string[] {
    const [segment = ''] = byline.split(/\s+[-–]\s+/);
    return segment
        .split(',')
        .map((name) => name.replace(/…|\.\.\./g, '').trim())
        .filter((name) => name.length > 1 && !/\d/.test(name));
}

/**
 * Collapse whitespace and cut to `maxLength` characters.
 */
export function cleanSnippet(text: string, maxLength = SNIPPET_MAX_LENGTH): string {
    const collapsed = collapseWhitespace(text);
    return collapsed.length > maxLength ? collapsed.slice(0, maxLength) : collapsed;
}

/**
 * Clean and normalize a paper title for comparison.
 * Case-folded and whitespace-collapsed; punctuation is kept.
 */
export function normalizeTitle(title: string): string {
    return collapseWhitespace(title).toLowerCase();
}

/** Structured APIs get the leading terms joined into one query. */
export const API_QUERY_TERMS = 5;

export function apiQueryTerms(terms: readonly string[]): string[] {
    return terms.slice(0, API_QUERY_TERMS);
}
