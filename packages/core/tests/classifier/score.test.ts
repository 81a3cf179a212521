import { describe, it, expect } from 'vitest';
import { scoreCandidates, compareCandidates, tokenConfidence } from '../../src/classifier/score.js';
import type { Candidate, ScoreContext } from '../../src/classifier/types.js';
import { DEFAULT_CATEGORIES } from '../../src/types/index.js';

const context: ScoreContext = {
    empty: false,
    defaultCategory: 'Other',
    fallbackCategory: 'Other',
    priority: DEFAULT_CATEGORIES,
    scoring: { baseline: 0.5, tokenBase: 0.6, tokenIncrement: 0.1, tokenCeiling: 0.95 },
};

// Helper to create a keyword candidate
function keyword(category: string, hitCount: number, position: number, matchedTerm = 'kw'): Candidate {
    return { category, matchedTerm, kind: 'keyword', hitCount, position };
}

describe('scoreCandidates', () => {
    describe('no candidates', () => {
        it('maps empty input to empty_normalized with zero confidence', () => {
            expect(scoreCandidates([], { ...context, empty: true })).toEqual({
                category: 'Other',
                confidence: 0,
                method: 'empty_normalized',
                matched_term: null,
                hit_count: 0,
            });
        });

        it('maps unmatched text to default_other at the baseline', () => {
            expect(scoreCandidates([], context)).toEqual({
                category: 'Other',
                confidence: 0.5,
                method: 'default_other',
                matched_term: null,
                hit_count: 0,
            });
        });

        it('uses the configured default category', () => {
            const result = scoreCandidates([], { ...context, defaultCategory: 'Shopping' });
            expect(result.category).toBe('Shopping');
            expect(result.method).toBe('default_other');
        });

        it('uses the fallback category for empty input even with another default', () => {
            const result = scoreCandidates([], { ...context, empty: true, defaultCategory: 'Shopping' });
            expect(result.category).toBe('Other');
        });
    });

    it('returns full confidence for an override', () => {
        const override: Candidate = {
            category: 'Food',
            matchedTerm: 'groceries and toiletries',
            kind: 'override',
            hitCount: 1,
            position: 0,
        };
        expect(scoreCandidates([override], context)).toEqual({
            category: 'Food',
            confidence: 1,
            method: 'override',
            matched_term: 'groceries and toiletries',
            hit_count: 1,
        });
    });

    describe('keyword tie-breaking', () => {
        it('prefers the higher hit count', () => {
            const result = scoreCandidates([keyword('Food', 1, 0), keyword('Transport', 2, 3)], context);
            expect(result.category).toBe('Transport');
            expect(result.confidence).toBe(0.8);
        });

        it('prefers the earlier match when hit counts tie', () => {
            const result = scoreCandidates([keyword('Food', 1, 4), keyword('Transport', 1, 1)], context);
            expect(result.category).toBe('Transport');
        });

        it('falls back to category priority when everything else ties', () => {
            const result = scoreCandidates([keyword('Bills', 1, 0), keyword('Transport', 1, 0)], context);
            expect(result.category).toBe('Transport');
        });

        it('does not depend on candidate order', () => {
            const a = keyword('Bills', 1, 0, 'gas bill');
            const b = keyword('Transport', 1, 0, 'gas');
            expect(scoreCandidates([a, b], context)).toEqual(scoreCandidates([b, a], context));
        });

        it('reports the winning term and hit count', () => {
            const result = scoreCandidates([keyword('Food', 2, 0, 'starbucks')], context);
            expect(result).toEqual({
                category: 'Food',
                confidence: 0.8,
                method: 'token_match',
                matched_term: 'starbucks',
                hit_count: 2,
            });
        });
    });
});

describe('compareCandidates', () => {
    it('ranks categories missing from the priority list last', () => {
        expect(compareCandidates(keyword('Zzz', 1, 0), keyword('Other', 1, 0), DEFAULT_CATEGORIES)).toBeGreaterThan(0);
    });
});

describe('tokenConfidence', () => {
    it.each([
        [1, 0.7],
        [2, 0.8],
        [3, 0.9],
        [4, 0.95],
        [10, 0.95],
    ])('%i hits -> %f', (hits, expected) => {
        expect(tokenConfidence(hits, context.scoring)).toBe(expected);
    });

    it('never reaches override confidence', () => {
        expect(tokenConfidence(1000, context.scoring)).toBeLessThan(1);
    });
});
