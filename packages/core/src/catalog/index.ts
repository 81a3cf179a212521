/**
 * Catalog module: rule catalog loading, validation and live swapping.
 */

export { loadCatalog } from './load.js';
export { CatalogStore } from './store.js';
export { ConfigError } from './errors.js';
export type { CatalogLoadResult } from './load.js';
