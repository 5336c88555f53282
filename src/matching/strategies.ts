import { UNKNOWN_AUTHORS, type Artifact, type CorpusRecord, type MatchCandidate, type MatchingConfig } from '../types/index.js';
import { TITLE_STOPWORDS } from '../nlp/stopwords.js';
import { splitWords } from '../nlp/tokenizer.js';
import { containsNumber, fileStem, leadingInteger } from './filename.js';

/**
 * Everything a strategy needs about one (artifact, record) pair.
 */
export interface MatchContext {
    artifact: Artifact;
    record: CorpusRecord;
    /** 1-based position of the record in corpus order */
    position: number;
    stem: string;
    config: MatchingConfig;
}

export type MatchStrategyFn = (context: MatchContext) => MatchCandidate | null;

/**
 * File name starts with the record's corpus position: "3_Some Study.pdf" → third record.
 */
export const sequentialPosition: MatchStrategyFn = ({ artifact, record, position, config }) => {
    if (leadingInteger(artifact.filename) !== position) return null;
    return candidate(artifact, record, 'sequential_position', `position(${position})`, config.sequentialConfidence);
};

/**
 * Record id appears in the file name as a standalone number.
 */
export const identifier: MatchStrategyFn = ({ artifact, record, stem, config }) => {
    if (!containsNumber(stem, record.id)) return null;
    return candidate(artifact, record, 'identifier', `id(${record.id})`, config.identifierConfidence);
};

/**
 * The title's first few significant words appear in the file name.
 */
export const leadingTitleWords: MatchStrategyFn = ({ artifact, record, stem, config }) => {
    const { wordCount, base, perMatch, cap } = config.leadingWords;
    if (record.title.trim().length <= 5) return null;

    const words = splitWords(record.title)
        .filter((word) => word.length > 2)
        .slice(0, wordCount);
    const matched = words.filter((word) => stem.includes(word)).length;
    if (matched === 0) return null;

    const confidence = Math.min(cap, base + perMatch * matched + topicalBonus(record, stem, config));
    return candidate(artifact, record, 'leading_title_words', `first_words(${matched}/${words.length})`, confidence);
};

/**
 * Share of the title's non-stop-words found anywhere in the file name.
 */
export const anyTitleWords: MatchStrategyFn = ({ artifact, record, stem, config }) => {
    const { base, ratioWeight, perMatch, cap } = config.anyWords;
    if (record.title.trim().length <= 10) return null;

    const words = splitWords(record.title).filter((word) => word.length > 2 && !TITLE_STOPWORDS.has(word));
    if (words.length === 0) return null;

    const matched = words.filter((word) => stem.includes(word)).length;
    if (matched === 0) return null;

    const ratio = matched / words.length;
    const confidence = Math.min(cap, base + ratioWeight * ratio + perMatch * matched + topicalBonus(record, stem, config));
    return candidate(artifact, record, 'any_title_words', `words(${matched}/${words.length})`, confidence);
};

/**
 * First author's surname and the publication year both appear in the file name.
 */
export const authorYear: MatchStrategyFn = ({ artifact, record, stem, config }) => {
    const surname = firstAuthorSurname(record.authors);
    if (!surname || record.year === undefined) return null;
    if (!stem.includes(surname) || !stem.includes(String(record.year))) return null;
    return candidate(artifact, record, 'author_year', `${surname}_${record.year}`, config.authorYearConfidence);
};

/** Tried for every pair; the highest confidence wins. */
export const STRATEGIES: readonly MatchStrategyFn[] = [
    sequentialPosition,
    identifier,
    leadingTitleWords,
    anyTitleWords,
    authorYear,
];

/**
 * Best candidate for one pair, or null when no strategy fires.
 * On equal confidence the earlier strategy wins.
 */
export function scorePair(
    artifact: Artifact,
    record: CorpusRecord,
    position: number,
    config: MatchingConfig
): MatchCandidate | null {
    const context: MatchContext = { artifact, record, position, stem: fileStem(artifact.filename), config };
    let best: MatchCandidate | null = null;
    for (const strategy of STRATEGIES) {
        const result = strategy(context);
        if (result && (!best || result.confidence > best.confidence)) best = result;
    }
    return best;
}

/**
 * Lowercased surname of the first listed author, when longer than three letters.
 * "Jane Smith, Bo Li" → "smith"
 */
export function firstAuthorSurname(authors: string): string | undefined {
    if (!authors || authors === UNKNOWN_AUTHORS) return undefined;

    const first = (authors.split(',')[0] ?? '').split(';')[0]?.trim() ?? '';
    const surname = (first.split(/\s+/).pop() ?? '').toLowerCase().replace(/[^\p{L}-]/gu, '');
    return surname.length > 3 ? surname : undefined;
}

// ─── Private helpers ──────────────────────────────────────

function topicalBonus(record: CorpusRecord, stem: string, config: MatchingConfig): number {
    const title = record.title.toLowerCase();
    const hit = config.topicalKeywords.some((keyword) => {
        const needle = keyword.trim().toLowerCase();
        return needle.length > 0 && title.includes(needle) && stem.includes(needle);
    });
    return hit ? config.topicalBonus : 0;
}

function candidate(
    artifact: Artifact,
    record: CorpusRecord,
    strategy: MatchCandidate['strategy'],
    detail: string,
    confidence: number
): MatchCandidate {
    return { recordId: record.id, artifactRef: artifact.ref, strategy, detail, confidence };
}
