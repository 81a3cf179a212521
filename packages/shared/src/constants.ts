/**
 * Constants for txclass.
 */

/**
 * Category every catalog carries. Used for empty input and as the
 * default fallback when no rule matches.
 */
export const FALLBACK_CATEGORY = 'Other';

/**
 * Default category set. Order is the tie-break priority: when two
 * categories match with the same hit count at the same position, the one
 * listed first wins.
 */
export const DEFAULT_CATEGORIES = [
    'Food',
    'Transport',
    'Entertainment',
    'Shopping',
    'Bills',
    'Rent',
    'Transfer',
    FALLBACK_CATEGORY,
] as const;

/**
 * Classification methods, from strongest to weakest evidence.
 */
export const CLASSIFICATION_METHODS = [
    'override',
    'token_match',
    'default_other',
    'empty_normalized',
] as const;

/**
 * Fixed confidence values. 1.0 is reserved for overrides.
 */
export const CONFIDENCE = {
    OVERRIDE: 1.0,
    EMPTY_NORMALIZED: 0.0,
} as const;

/**
 * Default scoring constants.
 *
 * token_match confidence = min(TOKEN_CEILING, TOKEN_BASE + hits * TOKEN_INCREMENT)
 * which gives 0.7, 0.8, 0.9, 0.95 for 1..4+ keyword hits. BASELINE is the
 * default_other confidence and must stay below a single-hit match.
 */
export const SCORING_DEFAULTS = {
    BASELINE: 0.5,
    TOKEN_BASE: 0.6,
    TOKEN_INCREMENT: 0.1,
    TOKEN_CEILING: 0.95,
} as const;

/**
 * Decimal places kept on computed confidences.
 */
export const CONFIDENCE_PRECISION = 4;
