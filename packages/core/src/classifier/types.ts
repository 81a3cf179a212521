/**
 * Internal types for classifier module.
 */

import type {
    Category,
    ClassificationResult,
    ClassificationStats,
    ScoringConfig,
} from '../types/index.js';

/**
 * One category proposed by the matcher. Transient; never persisted.
 *
 * position is the token index of the earliest keyword hit (0 for
 * overrides). hitCount is the number of distinct keywords of this
 * category found in the text.
 */
export interface Candidate {
    category: Category;
    matchedTerm: string;
    kind: 'override' | 'keyword';
    hitCount: number;
    position: number;
}

/**
 * Everything the scorer needs besides the candidates.
 */
export interface ScoreContext {
    /** The description normalized to the empty sentinel */
    empty: boolean;
    defaultCategory: Category;
    fallbackCategory: Category;
    /** Tie-break order, earlier wins */
    priority: readonly Category[];
    scoring: ScoringConfig;
}

/**
 * Output of classifyAll(). results[i] belongs to items[i].
 */
export interface BatchClassification {
    results: ClassificationResult[];
    stats: ClassificationStats;
}
