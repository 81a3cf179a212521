/**
 * Candidate scoring: turns matcher output into one ClassificationResult.
 *
 * Confidence ladder:
 *   empty_normalized  0.0
 *   default_other     scoring.baseline              (0.5 by default)
 *   token_match       min(ceiling, base + hits * increment)   (0.7 .. 0.95)
 *   override          1.0
 *
 * Total over every matcher output, including no candidates.
 */

import { CONFIDENCE, roundConfidence } from '../types/index.js';
import type { ClassificationResult, ScoringConfig } from '../types/index.js';
import type { Candidate, ScoreContext } from './types.js';

export function scoreCandidates(
    candidates: readonly Candidate[],
    context: ScoreContext
): ClassificationResult {
    if (candidates.length === 0) {
        if (context.empty) {
            return {
                category: context.fallbackCategory,
                confidence: CONFIDENCE.EMPTY_NORMALIZED,
                method: 'empty_normalized',
                matched_term: null,
                hit_count: 0,
            };
        }
        return {
            category: context.defaultCategory,
            confidence: roundConfidence(context.scoring.baseline),
            method: 'default_other',
            matched_term: null,
            hit_count: 0,
        };
    }

    const override = candidates.find((c) => c.kind === 'override');
    if (override) {
        return {
            category: override.category,
            confidence: CONFIDENCE.OVERRIDE,
            method: 'override',
            matched_term: override.matchedTerm,
            hit_count: override.hitCount,
        };
    }

    const winner = [...candidates].sort((a, b) => compareCandidates(a, b, context.priority))[0];
    return {
        category: winner.category,
        confidence: tokenConfidence(winner.hitCount, context.scoring),
        method: 'token_match',
        matched_term: winner.matchedTerm,
        hit_count: winner.hitCount,
    };
}

/**
 * Deterministic keyword tie-break:
 * 1. More distinct keyword hits
 * 2. Earlier first hit in the text
 * 3. Earlier category in the priority list
 */
export function compareCandidates(
    a: Candidate,
    b: Candidate,
    priority: readonly string[]
): number {
    if (a.hitCount !== b.hitCount) return b.hitCount - a.hitCount;
    if (a.position !== b.position) return a.position - b.position;
    return rank(a.category, priority) - rank(b.category, priority);
}

function rank(category: string, priority: readonly string[]): number {
    const index = priority.indexOf(category);
    return index === -1 ? priority.length : index;
}

/**
 * token_match confidence for a hit count, clamped below 1.0.
 */
export function tokenConfidence(hitCount: number, scoring: ScoringConfig): number {
    return roundConfidence(Math.min(scoring.tokenCeiling, scoring.tokenBase + hitCount * scoring.tokenIncrement));
}
