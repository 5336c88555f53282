import { DEFAULT_CONFIG, type SourceAdapter } from '../types/index.js';
import { createDefaultRegistry, type SourceRegistry } from '../sources/registry.js';
import { runSearch, type OrchestratorOptions, type SearchRun } from './orchestrator.js';

export interface SearchOptions extends OrchestratorOptions {
    /** Resolves source names; the built-in registry is used when omitted */
    registry?: SourceRegistry;
}

/**
 * Search the given sources and return the deduplicated corpus with its run statistics.
 * Sources may be adapter instances or registered display names.
 *
 * @example
 * const { corpus, statistics } = await search(['sleep', 'memory'], null, ['Semantic Scholar', 'arXiv']);
 */
export async function search(
    keywords: readonly string[],
    researchQuestion: string | null | undefined,
    sources: ReadonlyArray<SourceAdapter | string>,
    options: SearchOptions = {}
): Promise<SearchRun> {
    const { registry, ...orchestratorOptions } = options;

    let lookup = registry;
    const adapters = sources.map((source) => {
        if (typeof source !== 'string') return source;
        lookup ??= createDefaultRegistry(DEFAULT_CONFIG);
        const [adapter] = lookup.resolve([source]);
        if (!adapter) throw new Error(`Unknown source: ${source}`);
        return adapter;
    });

    return runSearch(keywords, researchQuestion, adapters, orchestratorOptions);
}
