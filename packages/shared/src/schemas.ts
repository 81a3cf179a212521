/**
 * Zod schemas for txclass data structures.
 *
 * Snake_case fields are the wire/config shape (catalog documents, JSON
 * results). Anything read from outside the process goes through one of
 * these schemas first.
 */

import { z } from 'zod';
import { CLASSIFICATION_METHODS, CONFIDENCE_PRECISION, SCORING_DEFAULTS } from './constants.js';
import { roundConfidence } from './confidence.js';

// ============================================================================
// Primitive Validators
// ============================================================================

const nonBlank = z.string().refine((s) => s.trim().length > 0, 'Must not be empty');

/**
 * Confidence score in [0, 1].
 */
const confidence = z.number().min(0).max(1);

/**
 * Category label. Membership in the catalog's category set is checked by
 * the loader, not here.
 */
export const CategorySchema = nonBlank;

export type Category = z.infer<typeof CategorySchema>;

export const ClassificationMethodSchema = z.enum(CLASSIFICATION_METHODS);

export type ClassificationMethod = z.infer<typeof ClassificationMethodSchema>;

// ============================================================================
// Classification Result
// ============================================================================

/**
 * What classify() returns.
 */
export const ClassificationResultSchema = z.object({
    category: CategorySchema,
    confidence,
    method: ClassificationMethodSchema,
    matched_term: z.string().nullable(),
    hit_count: z.number().int().min(0),
});

export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;

/**
 * Input item for batch classification.
 * amount is carried through but never used for the decision.
 */
export const ClassificationInputSchema = z.object({
    description: z.string(),
    amount: z.number().nullable().optional(),
});

export type ClassificationInput = z.infer<typeof ClassificationInputSchema>;

/**
 * Aggregate counts from a batch run.
 */
export const ClassificationStatsSchema = z.object({
    total: z.number().int().min(0),
    byMethod: z.object({
        override: z.number().int().min(0),
        token_match: z.number().int().min(0),
        default_other: z.number().int().min(0),
        empty_normalized: z.number().int().min(0),
    }),
    byCategory: z.record(z.string(), z.number().int().min(0)),
});

export type ClassificationStats = z.infer<typeof ClassificationStatsSchema>;

// ============================================================================
// Catalog Source (configuration document)
// ============================================================================

/**
 * One override written in list form.
 */
export const OverrideEntrySchema = z.object({
    phrase: nonBlank,
    category: CategorySchema,
});

export type OverrideEntry = z.infer<typeof OverrideEntrySchema>;

/**
 * Overrides accept either a phrase -> category mapping or a list of
 * entries. The list form can express (and therefore be checked for)
 * the same phrase mapped twice.
 */
export const OverridesSourceSchema = z.union([
    z.record(z.string(), CategorySchema),
    z.array(OverrideEntrySchema),
]);

export type OverridesSource = z.infer<typeof OverridesSourceSchema>;

/**
 * Scoring constants with their ordering invariants, checked on the values
 * the scorer actually reports (rounded to CONFIDENCE_PRECISION places):
 * - token_ceiling < 1 (1.0 belongs to overrides)
 * - baseline < token_base + token_increment (fallback below any keyword match)
 * - token_base + token_increment <= token_ceiling
 */
export const ScoringSourceSchema = z
    .object({
        baseline: confidence.default(SCORING_DEFAULTS.BASELINE),
        token_base: confidence.default(SCORING_DEFAULTS.TOKEN_BASE),
        token_increment: z.number().positive().max(1).default(SCORING_DEFAULTS.TOKEN_INCREMENT),
        token_ceiling: z.number().min(0).lt(1).default(SCORING_DEFAULTS.TOKEN_CEILING),
    })
    .refine((s) => roundConfidence(s.token_ceiling) < 1, {
        message: `token_ceiling must stay below 1 at ${CONFIDENCE_PRECISION} decimal places`,
        path: ['token_ceiling'],
    })
    .refine((s) => roundConfidence(s.baseline) < roundConfidence(s.token_base + s.token_increment), {
        message: 'baseline must be lower than token_base + token_increment',
        path: ['baseline'],
    })
    .refine((s) => roundConfidence(s.token_base + s.token_increment) <= roundConfidence(s.token_ceiling), {
        message: 'token_base + token_increment must not exceed token_ceiling',
        path: ['token_ceiling'],
    });

export type ScoringSource = z.infer<typeof ScoringSourceSchema>;

/**
 * Rule catalog document as written in config/catalog.yaml (or .json).
 */
export const CatalogSourceSchema = z.object({
    categories: z.array(CategorySchema).min(1).optional(),
    default_category: CategorySchema.optional(),
    keywords: z.record(z.string(), z.array(z.string())).default({}),
    overrides: OverridesSourceSchema.default({}),
    stop_words: z.array(z.string()).default([]),
    scoring: ScoringSourceSchema.default({}),
});

export type CatalogSource = z.infer<typeof CatalogSourceSchema>;
export type CatalogSourceInput = z.input<typeof CatalogSourceSchema>;

// ============================================================================
// Sheet Parsing
// ============================================================================

/**
 * One row read from a transaction export for batch classification.
 */
export const SheetRowSchema = z.object({
    row: z.number().int().min(1),
    description: z.string(),
    amount: z.number().nullable(),
});

export type SheetRow = z.infer<typeof SheetRowSchema>;

/**
 * Result returned by the sheet parser. Warnings are returned as data.
 */
export const SheetParseResultSchema = z.object({
    rows: z.array(SheetRowSchema),
    warnings: z.array(z.string()),
    skippedRows: z.number().int().min(0),
});

export type SheetParseResult = z.infer<typeof SheetParseResultSchema>;
