/**
 * Holder for the live rule catalog.
 *
 * Readers take the reference once per operation. reload() builds the
 * replacement completely before the single assignment that publishes it,
 * so a reader sees either the old catalog or the new one, never a mix.
 */

import { loadCatalog } from './load.js';
import type { RuleCatalog } from '../types/index.js';

export class CatalogStore {
    private catalog: RuleCatalog;

    constructor(initial: RuleCatalog) {
        this.catalog = initial;
    }

    /**
     * Create a store from a configuration document.
     *
     * @throws ConfigError
     */
    static fromSource(source: unknown): { store: CatalogStore; warnings: string[] } {
        const { catalog, warnings } = loadCatalog(source);
        return { store: new CatalogStore(catalog), warnings };
    }

    current(): RuleCatalog {
        return this.catalog;
    }

    /**
     * Load a new catalog and publish it. On ConfigError the previous
     * catalog stays current and the error propagates.
     *
     * @returns Load warnings for the new catalog
     */
    reload(source: unknown): string[] {
        const { catalog, warnings } = loadCatalog(source);
        this.catalog = catalog;
        return warnings;
    }

    replace(catalog: RuleCatalog): void {
        this.catalog = catalog;
    }
}
