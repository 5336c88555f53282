import type { LitScoutConfig, SourceAdapter } from '../types/index.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { ArxivAdapter } from './arxiv.js';
import { CoreAdapter } from './core.js';
import { DuckDuckGoAcademicAdapter } from './duckduckgo.js';
import { GoogleScholarAdapter } from './google-scholar.js';
import { OpenAlexAdapter } from './openalex.js';
import { PubMedAdapter } from './pubmed.js';
import { SemanticScholarAdapter } from './semantic-scholar.js';
import { SITE_SEARCH_SOURCES, SiteSearchAdapter } from './site-search.js';

/**
 * Raised when a requested source name has no registered adapter.
 */
export class UnknownSourceError extends Error {
    constructor(
        public readonly names: string[],
        public readonly available: string[]
    ) {
        super(`Unknown source(s): ${names.join(', ')}. Available: ${available.join(', ')}`);
        this.name = 'UnknownSourceError';
    }
}

/**
 * Source adapters keyed by display name.
 */
export class SourceRegistry {
    private readonly adapters = new Map<string, SourceAdapter>();

    register(adapter: SourceAdapter): this {
        if (this.adapters.has(adapter.name)) {
            throw new Error(`Source already registered: ${adapter.name}`);
        }
        this.adapters.set(adapter.name, adapter);
        return this;
    }

    get(name: string): SourceAdapter | undefined {
        return this.adapters.get(name);
    }

    /**
     * Look up several sources at once, in the order given.
     * @throws UnknownSourceError naming every missing source
     */
    resolve(names: readonly string[]): SourceAdapter[] {
        const missing = names.filter((name) => !this.adapters.has(name));
        if (missing.length > 0) {
            throw new UnknownSourceError(missing, this.list());
        }
        return names.flatMap((name) => {
            const adapter = this.adapters.get(name);
            return adapter ? [adapter] : [];
        });
    }

    list(): string[] {
        return [...this.adapters.keys()];
    }
}

/**
 * Registry holding every built-in source, sharing one HTTP client.
 */
export function createDefaultRegistry(config: LitScoutConfig, httpClient: HttpClient = createHttpClient(config)): SourceRegistry {
    const shared = { httpClient, maxResults: config.maxResultsPerSource };
    const registry = new SourceRegistry()
        .register(new SemanticScholarAdapter({ ...shared, apiKey: config.apiKeys.semanticScholar }))
        .register(new OpenAlexAdapter({ ...shared, apiKey: config.apiKeys.openalex, email: config.email }))
        .register(new PubMedAdapter({ ...shared, apiKey: config.apiKeys.pubmed }))
        .register(new CoreAdapter({ ...shared, apiKey: config.apiKeys.core }))
        .register(new ArxivAdapter(shared))
        .register(new GoogleScholarAdapter(shared))
        .register(new DuckDuckGoAcademicAdapter(shared));

    for (const [name, plan] of Object.entries(SITE_SEARCH_SOURCES)) {
        registry.register(new SiteSearchAdapter(name, plan, shared));
    }

    return registry;
}
