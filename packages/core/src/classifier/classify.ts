/**
 * Classification engine: Normalizer -> Matcher -> Scorer.
 *
 * ARCHITECTURAL NOTE: Pure and synchronous. The only state is the catalog
 * reference, read once per call (or once per batch).
 *
 * amount is accepted for callers that carry it and is not used in any
 * decision.
 */

import { normalizeDescription } from '../utils/normalize.js';
import { CatalogStore } from '../catalog/store.js';
import { matchCandidates } from './match.js';
import { scoreCandidates } from './score.js';
import type {
    RuleCatalog,
    ClassificationResult,
    ClassificationInput,
    ClassificationStats,
    ClassificationMethod,
} from '../types/index.js';
import type { BatchClassification } from './types.js';

/**
 * Classify one description against a catalog. Never throws.
 */
export function classify(
    description: string,
    catalog: RuleCatalog,
    _amount?: number | null
): ClassificationResult {
    const text = normalizeDescription(description, { stopWords: catalog.stopWords });
    const candidates = matchCandidates(text, catalog);

    return scoreCandidates(candidates, {
        empty: text.kind === 'empty',
        defaultCategory: catalog.defaultCategory,
        fallbackCategory: catalog.fallbackCategory,
        priority: catalog.categories,
        scoring: catalog.scoring,
    });
}

/**
 * Classify a batch against one catalog snapshot.
 *
 * @returns Results in input order, with counts per method and per category
 */
export function classifyAll(
    items: readonly ClassificationInput[],
    catalog: RuleCatalog
): BatchClassification {
    const stats = emptyStats(catalog);
    const results = items.map((item) => {
        const result = classify(item.description, catalog, item.amount);
        stats.total++;
        stats.byMethod[result.method]++;
        stats.byCategory[result.category] = (stats.byCategory[result.category] ?? 0) + 1;
        return result;
    });

    return { results, stats };
}

function emptyStats(catalog: RuleCatalog): ClassificationStats {
    const byMethod = {
        override: 0,
        token_match: 0,
        default_other: 0,
        empty_normalized: 0,
    } satisfies Record<ClassificationMethod, number>;

    return {
        total: 0,
        byMethod,
        byCategory: Object.fromEntries(catalog.categories.map((c) => [c, 0])),
    };
}

/**
 * Facade over a fixed catalog or a reloadable CatalogStore.
 */
export class ClassificationEngine {
    private readonly source: RuleCatalog | CatalogStore;

    constructor(source: RuleCatalog | CatalogStore) {
        this.source = source;
    }

    get catalog(): RuleCatalog {
        return this.source instanceof CatalogStore ? this.source.current() : this.source;
    }

    classify(description: string, amount?: number | null): ClassificationResult {
        return classify(description, this.catalog, amount);
    }

    classifyAll(items: readonly ClassificationInput[]): BatchClassification {
        return classifyAll(items, this.catalog);
    }
}
