import { CONFIDENCE_PRECISION } from './constants.js';

const FACTOR = 10 ** CONFIDENCE_PRECISION;

/**
 * Round a confidence to CONFIDENCE_PRECISION places.
 *
 * Every confidence the scorer reports passes through here, and the scoring
 * schema checks its orderings on rounded values, so rounding cannot push a
 * keyword match to 1.0 or the fallback above a single-hit match.
 */
export function roundConfidence(value: number): number {
    return Math.round(value * FACTOR) / FACTOR;
}
