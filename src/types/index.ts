/**
 * Barrel export for all shared types.
 */
export { UNKNOWN_AUTHORS } from './record.js';
export type { CandidateRecord, CorpusRecord, Corpus, TermSetKind, SearchTermSet } from './record.js';
export { DEFAULT_CONFIG, DEFAULT_MATCHING_CONFIG, DEFAULT_USER_AGENTS } from './config.js';
export type {
    LitScoutConfig,
    LogLevel,
    MatchingConfig,
    LeadingWordsConfig,
    AnyWordsConfig,
    ApiKeysConfig,
} from './config.js';
export type {
    SourceAdapter,
    SourceAdapterOptions,
    SourceSearchResult,
    AdapterSearchOptions,
    AdapterFailure,
    AdapterFailureReason,
} from './source-adapter.js';
export type {
    Artifact,
    MatchStrategy,
    MatchCandidate,
    Assignment,
    ConflictReason,
    MatchConflict,
    ArtifactStatus,
    ArtifactOutcome,
    MatchReport,
} from './artifact.js';
