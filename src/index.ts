/**
 * litscout: federated literature search and full-text matching.
 */
export * from './types/index.js';

export { search, type SearchOptions } from './search/search.js';
export { runSearch, type OrchestratorOptions, type SearchRun } from './search/orchestrator.js';
export { plan, extractQuestionTerms, createKeywordCombinations } from './search/term-planner.js';
export { dedupe, countDuplicates } from './search/deduplicator.js';
export { RunStatistics, type SourceOutcome, type RunStatisticsSnapshot } from './search/statistics.js';

export { isAcademic, scoreAcademic, isStructurallyValid, type AcademicScore } from './validation/academic-filter.js';

export { FallbackChainAdapter, AdapterError, type RawHit, type SearchTechnique, type TechniqueContext } from './sources/base.js';
export { SourceRegistry, UnknownSourceError, createDefaultRegistry } from './sources/registry.js';
export { SemanticScholarAdapter } from './sources/semantic-scholar.js';
export { OpenAlexAdapter } from './sources/openalex.js';
export { PubMedAdapter } from './sources/pubmed.js';
export { CoreAdapter } from './sources/core.js';
export { ArxivAdapter } from './sources/arxiv.js';
export { GoogleScholarAdapter } from './sources/google-scholar.js';
export { DuckDuckGoAcademicAdapter } from './sources/duckduckgo.js';
export { SiteSearchAdapter, SITE_SEARCH_SOURCES, type SiteSearchPlan } from './sources/site-search.js';

export { match, resolve, matchArtifacts, resolveMatchingConfig, type MatchOptions } from './matching/artifact-matcher.js';

export { HttpClient, HttpError, createHttpClient, type HttpClientOptions } from './utils/http-client.js';
export { ConfigError, resolveConfig, mergeConfig, parseFileConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
