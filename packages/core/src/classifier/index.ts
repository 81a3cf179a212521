/**
 * Classifier module: rule-based transaction description classification.
 */

export { classify, classifyAll, ClassificationEngine } from './classify.js';
export { matchCandidates, findTokenSequence } from './match.js';
export { scoreCandidates, compareCandidates, tokenConfidence } from './score.js';
export type { Candidate, ScoreContext, BatchClassification } from './types.js';
