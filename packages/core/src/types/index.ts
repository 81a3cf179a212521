/**
 * Re-export shared types, plus the in-memory shapes only core builds.
 */
export type {
    Category,
    ClassificationMethod,
    ClassificationResult,
    ClassificationInput,
    ClassificationStats,
    CatalogSource,
    CatalogSourceInput,
    SheetRow,
    SheetParseResult,
} from '@txclass/shared';

export {
    CatalogSourceSchema,
    ClassificationResultSchema,
    SheetParseResultSchema,
    FALLBACK_CATEGORY,
    DEFAULT_CATEGORIES,
    CLASSIFICATION_METHODS,
    CONFIDENCE,
    SCORING_DEFAULTS,
    CONFIDENCE_PRECISION,
    roundConfidence,
} from '@txclass/shared';

import type { Category } from '@txclass/shared';

/**
 * A keyword after normalization. tokens is the sequence that must appear
 * contiguously in a description's tokens.
 */
export interface KeywordEntry {
    readonly keyword: string;
    readonly tokens: readonly string[];
}

export interface ScoringConfig {
    readonly baseline: number;
    readonly tokenBase: number;
    readonly tokenIncrement: number;
    readonly tokenCeiling: number;
}

/**
 * Validated, frozen rule catalog.
 *
 * categories order is the tie-break priority. keywords holds an entry for
 * every category (possibly empty), in category order.
 */
export interface RuleCatalog {
    readonly categories: readonly Category[];
    readonly defaultCategory: Category;
    /** Canonical spelling of the Other category; always present. */
    readonly fallbackCategory: Category;
    readonly keywords: ReadonlyMap<Category, readonly KeywordEntry[]>;
    readonly overrides: ReadonlyMap<string, Category>;
    readonly stopWords: ReadonlySet<string>;
    readonly scoring: ScoringConfig;
}
