/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Scoring parameters for the leading-title-words strategy.
 */
export interface LeadingWordsConfig {
    wordCount: number;
    base: number;
    perMatch: number;
    cap: number;
}

/**
 * Scoring parameters for the any-significant-word strategy.
 */
export interface AnyWordsConfig {
    base: number;
    ratioWeight: number;
    perMatch: number;
    cap: number;
}

/**
 * Artifact matcher thresholds. Empirical values, kept configurable.
 */
export interface MatchingConfig {
    acceptanceThreshold: number;
    sequentialConfidence: number;
    identifierConfidence: number;
    leadingWords: LeadingWordsConfig;
    anyWords: AnyWordsConfig;
    authorYearConfidence: number;
    /** Domain keywords that earn `topicalBonus` when present in both title and filename */
    topicalKeywords: string[];
    topicalBonus: number;
}

/**
 * API keys for sources that accept or require one.
 */
export interface ApiKeysConfig {
    core?: string;
    semanticScholar?: string;
    openalex?: string;
    pubmed?: string;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface LitScoutConfig {
    // Search
    sources: string[];
    maxResultsPerSource: number;
    earlyExitRatio: number;
    concurrency?: number;

    // Politeness & timeouts
    delayRangeMs: [number, number];
    requestTimeoutMs: number;
    runTimeoutMs: number;
    maxRetries: number;
    userAgents: string[];
    email?: string;
    apiKeys: ApiKeysConfig;

    // Matching
    matching: MatchingConfig;

    // Output
    out: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

export const DEFAULT_USER_AGENTS: readonly string[] = [
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15',
];

export const DEFAULT_MATCHING_CONFIG: MatchingConfig = {
    acceptanceThreshold: 40,
    sequentialConfidence: 98,
    identifierConfidence: 95,
    leadingWords: {
        wordCount: 5,
        base: 40,
        perMatch: 15,
        cap: 95,
    },
    anyWords: {
        base: 30,
        ratioWeight: 30,
        perMatch: 5,
        cap: 85,
    },
    authorYearConfidence: 80,
    topicalKeywords: [],
    topicalBonus: 20,
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: LitScoutConfig = {
    sources: ['Semantic Scholar', 'Google Scholar', 'DuckDuckGo Academic'],
    maxResultsPerSource: 100,
    earlyExitRatio: 1 / 3,
    delayRangeMs: [1000, 3000],
    requestTimeoutMs: 15000,
    runTimeoutMs: 300000,
    maxRetries: 3,
    userAgents: [...DEFAULT_USER_AGENTS],
    apiKeys: {},
    matching: DEFAULT_MATCHING_CONFIG,
    out: './litscout.db',
    logLevel: 'info',
    jsonLogs: false,
};
