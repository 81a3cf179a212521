// Types (re-exported from shared)
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
    KeywordEntry,
    ScoringConfig,
    RuleCatalog,
} from './types/index.js';

export {
    CatalogSourceSchema,
    ClassificationResultSchema,
    SheetParseResultSchema,
    FALLBACK_CATEGORY,
    DEFAULT_CATEGORIES,
    CLASSIFICATION_METHODS,
    CONFIDENCE,
    SCORING_DEFAULTS,
} from './types/index.js';

// Utils
export { normalizeDescription, isEmptyNormalized, EMPTY_NORMALIZED } from './utils/index.js';
export type { NormalizedText, NormalizeOptions } from './utils/index.js';

// Catalog
export { loadCatalog, CatalogStore, ConfigError } from './catalog/index.js';
export type { CatalogLoadResult } from './catalog/index.js';

// Classifier
export {
    classify,
    classifyAll,
    ClassificationEngine,
    matchCandidates,
    findTokenSequence,
    scoreCandidates,
    compareCandidates,
    tokenConfidence,
} from './classifier/index.js';
export type { Candidate, ScoreContext, BatchClassification } from './classifier/index.js';

// Parsers
export { parseTransactionSheet, parseAmount } from './parser/index.js';
