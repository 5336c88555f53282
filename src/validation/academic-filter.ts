import lexicon from './academic-lexicon.json' with { type: 'json' };
import type { CandidateRecord } from '../types/index.js';

/** Titles shorter than this are navigation links, not works. */
export const MIN_SCRAPED_TITLE_LENGTH = 10;

/** Lexical score a scraped hit needs when its URL is not on a known academic domain. */
export const MIN_ACADEMIC_SCORE = 1;

const STRONG_DOMAIN_BONUS = 5;
const WEAK_DOMAIN_BONUS = 2;
const EARLIEST_YEAR = 1900;

interface WeightedTerm {
    pattern: RegExp;
    weight: number;
}

const INDICATORS: readonly WeightedTerm[] = compileTerms(lexicon.indicators);
const NON_ACADEMIC: readonly WeightedTerm[] = compileTerms(lexicon.nonAcademicIndicators);

const CITATION_MARKER = /\b(doi|pmid|isbn|issn):/;
const VOLUME_MARKER = /\b(volume|issue|pages?):\s*\d+/;

/**
 * Breakdown of an academic-likeness decision, for debug logging.
 */
export interface AcademicScore {
    accepted: boolean;
    lexicalScore: number;
    domainBonus: number;
    denied: boolean;
}

/**
 * Score a scraped hit for "looks like a real academic work".
 *
 * Denylisted hosts (social, video, shopping, wikis) are rejected outright.
 * Otherwise the hit is accepted when its URL is on a known academic domain
 * or its title and abstract reach `MIN_ACADEMIC_SCORE`.
 */
export function scoreAcademic(title: string, abstract: string, url: string): AcademicScore {
    const host = hostnameOf(url);
    if (host && lexicon.deniedDomains.some((domain) => hostMatches(host, domain))) {
        return { accepted: false, lexicalScore: 0, domainBonus: 0, denied: true };
    }

    if (title.trim().length < MIN_SCRAPED_TITLE_LENGTH) {
        return { accepted: false, lexicalScore: 0, domainBonus: 0, denied: false };
    }

    const text = `${title} ${abstract}`.toLowerCase();
    let lexicalScore = 0;

    for (const { pattern, weight } of INDICATORS) {
        if (pattern.test(text)) lexicalScore += weight;
    }
    for (const { pattern, weight } of NON_ACADEMIC) {
        if (pattern.test(text)) lexicalScore += weight;
    }
    if (CITATION_MARKER.test(text)) lexicalScore += 3;
    if (VOLUME_MARKER.test(text)) lexicalScore += 2;

    let domainBonus = 0;
    if (host) {
        if (lexicon.strongDomains.some((domain) => hostMatches(host, domain))) {
            domainBonus = STRONG_DOMAIN_BONUS;
        } else if (lexicon.weakDomains.some((domain) => hostMatches(host, domain))) {
            domainBonus = WEAK_DOMAIN_BONUS;
        }
    }

    return {
        accepted: domainBonus > 0 || lexicalScore >= MIN_ACADEMIC_SCORE,
        lexicalScore,
        domainBonus,
        denied: false,
    };
}

/**
 * `isAcademic(title, abstract, url) → bool`, applied by every scraping adapter.
 */
export function isAcademic(title: string, abstract: string, url: string): boolean {
    return scoreAcademic(title, abstract, url).accepted;
}

/**
 * Structural validation for records parsed from structured APIs:
 * a non-empty title and, when present, a year between 1900 and next year.
 */
export function isStructurallyValid(record: Pick<CandidateRecord, 'title' | 'year'>, now: Date = new Date()): boolean {
    if (!record.title.trim()) return false;
    if (record.year === undefined) return true;
    return isPlausibleYear(record.year, now);
}

export function isPlausibleYear(year: number, now: Date = new Date()): boolean {
    return Number.isInteger(year) && year >= EARLIEST_YEAR && year <= now.getFullYear() + 1;
}

// ─── Private helpers ─────────────────────────────────────

function compileTerms(weights: Record<string, number>): WeightedTerm[] {
    return Object.entries(weights).map(([term, weight]) => ({
        pattern: new RegExp(`\\b${term.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&')}\\b`),
        weight,
    }));
}

function hostnameOf(url: string): string {
    if (!url) return '';
    try {
        return new URL(url).hostname.toLowerCase();
    } catch {
        return '';
    }
}

/**
 * "www.nature.com" matches "nature.com"; entries starting with a dot match any host suffix (".edu").
 */
function hostMatches(host: string, domain: string): boolean {
    if (domain.startsWith('.')) return host.endsWith(domain);
    return host === domain || host.endsWith(`.${domain}`);
}
