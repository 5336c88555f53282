import { UNKNOWN_AUTHORS, type CandidateRecord, type Corpus, type CorpusRecord } from '../types/index.js';
import { collapseWhitespace } from '../nlp/tokenizer.js';
import { normalizeTitle } from '../sources/utils.js';

/** Corpus abstracts are cut to this many characters. */
export const ABSTRACT_MAX_LENGTH = 1000;

/**
 * Merge records from all sources into a corpus.
 *
 * The first record seen for each normalized title (trimmed, case-folded,
 * whitespace-collapsed) is kept; later ones are dropped. Survivors get dense
 * ids from 1 in order. Missing metadata is filled, never a reason to drop.
 * Running it again on its own output returns an equal corpus.
 */
export function dedupe(records: readonly CandidateRecord[]): Corpus {
    const seen = new Set<string>();
    const kept: CorpusRecord[] = [];

    for (const record of records) {
        const key = normalizeTitle(record.title);
        if (!key || seen.has(key)) continue;
        seen.add(key);
        kept.push({ ...cleanRecord(record), id: kept.length + 1 });
    }

    return { records: kept };
}

/**
 * Number of records `dedupe` would drop.
 */
export function countDuplicates(records: readonly CandidateRecord[]): number {
    return records.length - dedupe(records).records.length;
}

function cleanRecord(record: CandidateRecord): CandidateRecord {
    // Rebuilt field by field so a CorpusRecord's old id is not carried over
    const cleaned: CandidateRecord = {
        title: collapseWhitespace(record.title),
        authors: collapseWhitespace(record.authors) || UNKNOWN_AUTHORS,
        abstract: collapseWhitespace(record.abstract).slice(0, ABSTRACT_MAX_LENGTH),
        url: record.url.trim(),
        sourceName: record.sourceName,
        methodTag: record.methodTag,
        searchTermsUsed: [...record.searchTermsUsed],
    };
    if (record.year !== undefined) cleaned.year = record.year;
    if (record.doi) cleaned.doi = record.doi;
    return cleaned;
}
