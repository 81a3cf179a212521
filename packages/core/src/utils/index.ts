export { normalizeDescription, isEmptyNormalized, EMPTY_NORMALIZED } from './normalize.js';
export type { NormalizedText, NormalizeOptions } from './normalize.js';
export { stripBom } from './csv.js';
