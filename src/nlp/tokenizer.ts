/**
 * Extract alphanumeric words that start with a letter, lowercased.
 * "COVID-19 vaccine uptake?" → ["covid", "vaccine", "uptake"]
 */
export function extractWords(text: string): string[] {
    if (!text) return [];
    return text.toLowerCase().match(/\b[a-z][a-z0-9]*\b/g) ?? [];
}

/**
 * Split text on whitespace into lowercase words, trimming punctuation at the edges.
 * - "Diabetes:" → "diabetes"
 * - "(COVID-19)" → "covid-19"
 */
export function splitWords(text: string): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .split(/\s+/)
        .map((token) => token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
        .filter((token) => token.length > 0);
}

/**
 * Collapse runs of whitespace to one space and trim.
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
