/**
 * Candidate matching: override tier, then keyword tier.
 *
 * Keywords match whole tokens or contiguous token runs, so "rent" is found
 * in "rent payment" but not in "parent payment".
 */

import type { NormalizedText } from '../utils/normalize.js';
import type { RuleCatalog, KeywordEntry } from '../types/index.js';
import type { Candidate } from './types.js';

/**
 * Find the candidates for a normalized description.
 *
 * Tiers, first non-empty tier wins:
 * 1. Empty sentinel -> no candidates
 * 2. Exact override on the whole text -> one override candidate
 * 3. One keyword candidate per category with at least one hit, in catalog order
 */
export function matchCandidates(text: NormalizedText, catalog: RuleCatalog): Candidate[] {
    if (text.kind === 'empty') return [];

    const override = catalog.overrides.get(text.text);
    if (override !== undefined) {
        return [{ category: override, matchedTerm: text.text, kind: 'override', hitCount: 1, position: 0 }];
    }

    const candidates: Candidate[] = [];
    for (const category of catalog.categories) {
        const keywords = catalog.keywords.get(category) ?? [];
        let hitCount = 0;
        let first: { entry: KeywordEntry; position: number } | null = null;

        for (const entry of keywords) {
            const position = findTokenSequence(text.tokens, entry.tokens);
            if (position < 0) continue;
            hitCount++;
            // Leftmost hit names the candidate; a longer phrase wins a shared start
            if (
                first === null ||
                position < first.position ||
                (position === first.position && entry.tokens.length > first.entry.tokens.length)
            ) {
                first = { entry, position };
            }
        }

        if (first !== null) {
            candidates.push({
                category,
                matchedTerm: first.entry.keyword,
                kind: 'keyword',
                hitCount,
                position: first.position,
            });
        }
    }

    return candidates;
}

/**
 * Index of the first occurrence of sequence as a contiguous run in tokens,
 * or -1.
 */
export function findTokenSequence(tokens: readonly string[], sequence: readonly string[]): number {
    if (sequence.length === 0 || sequence.length > tokens.length) return -1;

    outer: for (let i = 0; i <= tokens.length - sequence.length; i++) {
        for (let j = 0; j < sequence.length; j++) {
            if (tokens[i + j] !== sequence[j]) continue outer;
        }
        return i;
    }
    return -1;
}
