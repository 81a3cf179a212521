// Schemas
export {
    CategorySchema,
    ClassificationMethodSchema,
    ClassificationResultSchema,
    ClassificationInputSchema,
    ClassificationStatsSchema,
    OverrideEntrySchema,
    OverridesSourceSchema,
    ScoringSourceSchema,
    CatalogSourceSchema,
    SheetRowSchema,
    SheetParseResultSchema,
} from './schemas.js';

// Types
export type {
    Category,
    ClassificationMethod,
    ClassificationResult,
    ClassificationInput,
    ClassificationStats,
    OverrideEntry,
    OverridesSource,
    ScoringSource,
    CatalogSource,
    CatalogSourceInput,
    SheetRow,
    SheetParseResult,
} from './schemas.js';

// Constants
export {
    FALLBACK_CATEGORY,
    DEFAULT_CATEGORIES,
    CLASSIFICATION_METHODS,
    CONFIDENCE,
    SCORING_DEFAULTS,
    CONFIDENCE_PRECISION,
} from './constants.js';

// Helpers
export { roundConfidence } from './confidence.js';
