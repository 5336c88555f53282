import type { SearchTermSet } from '../types/index.js';
import { QUESTION_STOPWORDS } from '../nlp/stopwords.js';
import { collapseWhitespace, extractWords } from '../nlp/tokenizer.js';

export const RESEARCH_QUESTION_PRIORITY = 1;
export const KEYWORD_PRIORITY_BASE = 2;
export const FALLBACK_PRIORITY = 10;
export const FALLBACK_TERMS: readonly string[] = ['research', 'study', 'analysis'];

const MAX_QUESTION_TERMS = 15;
const MAX_QUESTION_WORDS = 10;
const MAX_KEY_PHRASES = 8;
const MAX_KEYWORD_COMBINATIONS = 4;
const KEYWORD_CHUNK_SIZE = 5;

const CAPITALIZED_RUN = /\b[A-Z][A-Za-z0-9]*(?:\s+[A-Z][A-Za-z0-9]*)+\b/g;
const OUTCOME_PHRASE = /\b([A-Za-z0-9]+)\s+(levels?|rates?|effects?|factors?|methods?|techniques?|approaches?)\b/gi;
const FILLER_PHRASES = ['there is', 'there are', 'can be', 'will be'];

/**
 * Turn raw keywords and an optional research question into prioritized term sets.
 * Always returns at least one set; lower priority is tried first.
 */
export function plan(keywords: readonly string[], researchQuestion?: string | null): SearchTermSet[] {
    const sets: SearchTermSet[] = [];

    const question = researchQuestion?.trim() ?? '';
    if (question) {
        const extracted = extractQuestionTerms(question);
        sets.push({
            // Nothing survived stop-word removal: send the question as written
            terms: extracted.length > 0 ? extracted : [question],
            kind: 'research_question',
            priority: RESEARCH_QUESTION_PRIORITY,
            description: 'Research question terms',
        });
    }

    createKeywordCombinations(cleanKeywords(keywords)).forEach((combination, i) => {
        sets.push({
            terms: combination,
            kind: 'keywords',
            priority: KEYWORD_PRIORITY_BASE + i,
            description: `Keyword combination ${i + 1}`,
        });
    });

    if (sets.length === 0) {
        sets.push({
            terms: [...FALLBACK_TERMS],
            kind: 'fallback',
            priority: FALLBACK_PRIORITY,
            description: 'Basic fallback terms',
        });
    }

    return sets.sort((a, b) => a.priority - b.priority);
}

/**
 * Search terms mined from a research question: key phrases first, then single words.
 * Deduplicated case-insensitively, at most 15.
 */
export function extractQuestionTerms(question: string): string[] {
    const words = extractWords(question)
        .filter((word) => word.length > 2 && !QUESTION_STOPWORDS.has(word))
        .slice(0, MAX_QUESTION_WORDS);

    const seen = new Set<string>();
    const terms: string[] = [];
    for (const term of [...extractKeyPhrases(question), ...words]) {
        const key = term.toLowerCase();
        if (!seen.has(key)) {
            seen.add(key);
            terms.push(term);
        }
    }
    return terms.slice(0, MAX_QUESTION_TERMS);
}

/**
 * Multi-word candidates: runs of capitalized words ("Machine Learning", "Deep Brain Stimulation")
 * and outcome phrases such as "glucose levels" or "teaching methods".
 */
export function extractKeyPhrases(text: string): string[] {
    const cleaned = text.replace(/[^\w\s]/g, ' ');
    const phrases: string[] = [];

    for (const match of cleaned.matchAll(CAPITALIZED_RUN)) {
        const words = match[0].split(/\s+/);
        while (words.length > 0 && QUESTION_STOPWORDS.has((words[0] ?? '').toLowerCase())) {
            words.shift();
        }
        if (words.length >= 2) phrases.push(words.join(' '));
    }

    for (const match of cleaned.matchAll(OUTCOME_PHRASE)) {
        const head = match[1] ?? '';
        if (!QUESTION_STOPWORDS.has(head.toLowerCase())) phrases.push(collapseWhitespace(match[0]));
    }

    const unique = [...new Set(phrases)].filter(
        (phrase) => phrase.length > 5 && !FILLER_PHRASES.some((filler) => phrase.toLowerCase().includes(filler))
    );
    return unique.slice(0, MAX_KEY_PHRASES);
}

/**
 * The full list, the first 5, the first 3, then chunks of 5 (at least 2 keywords each).
 * Identical combinations are kept once; at most 4 are returned.
 */
export function createKeywordCombinations(keywords: readonly string[]): string[][] {
    if (keywords.length === 0) return [];

    const candidates: string[][] = [[...keywords]];
    if (keywords.length > 5) candidates.push(keywords.slice(0, 5));
    if (keywords.length > 3) candidates.push(keywords.slice(0, 3));
    for (let i = 0; i < keywords.length; i += KEYWORD_CHUNK_SIZE) {
        const chunk = keywords.slice(i, i + KEYWORD_CHUNK_SIZE);
        if (chunk.length >= 2) candidates.push(chunk);
    }

    const seen = new Set<string>();
    const combinations: string[][] = [];
    for (const combination of candidates) {
        const key = combination.join('\u0000');
        if (!seen.has(key)) {
            seen.add(key);
            combinations.push(combination);
        }
    }
    return combinations.slice(0, MAX_KEYWORD_COMBINATIONS);
}

function cleanKeywords(keywords: readonly string[]): string[] {
    return keywords.map((keyword) => collapseWhitespace(keyword)).filter((keyword) => keyword.length > 0);
}
