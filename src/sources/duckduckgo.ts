import { getLogger } from '../utils/logger.js';
import { isAcademic } from '../validation/academic-filter.js';
import { FallbackChainAdapter, type RawHit, type SearchTechnique, type TechniqueContext } from './base.js';
import { ACADEMIC_SITES, buildWebQuery, searchDuckDuckGo, webHitToRawHit } from './web-search.js';

/**
 * General web search steered towards academic sites.
 * When the academic-sites query covers less than half the limit, a broader
 * query tops it up with hits that pass the academic filter.
 */
export class DuckDuckGoAcademicAdapter extends FallbackChainAdapter {
    readonly name = 'DuckDuckGo Academic';
    readonly kind = 'scrape' as const;

    protected techniques(): readonly SearchTechnique[] {
        return [{ tag: 'enhanced_duckduckgo', kind: 'scrape', run: (terms, context) => this.searchEnhanced(terms, context) }];
    }

    private async searchEnhanced(terms: readonly string[], { limit, signal }: TechniqueContext): Promise<RawHit[]> {
        const logger = getLogger();
        const academicQuery = buildWebQuery(terms, { sites: ACADEMIC_SITES, academicSuffix: true });
        const hits = (await searchDuckDuckGo(this.httpClient, academicQuery, { signal })).map((hit) => webHitToRawHit(hit));

        if (hits.length >= Math.max(1, Math.floor(limit / 2))) {
            return hits.slice(0, limit);
        }

        logger.debug({ found: hits.length, limit }, 'Academic-sites query came up short, trying broader query');
        const broaderQuery = buildWebQuery(terms, { academicSuffix: true });
        const seen = new Set(hits.map((hit) => hit.url));
        const broader = (await searchDuckDuckGo(this.httpClient, broaderQuery, { signal }))
            .map((hit) => webHitToRawHit(hit))
            .filter((hit) => !seen.has(hit.url) && isAcademic(hit.title, hit.abstract, hit.url));

        return [...hits, ...broader].slice(0, limit);
    }
}
