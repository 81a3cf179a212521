import type { CatalogLoadResult } from '@txclass/core';
import { resolveCatalogLocation, loadCatalogFile } from '../workspace/config.js';
import { info, success, warn, arrow, fail } from '../utils/console.js';
import type { CatalogOptions } from '../types.js';

/**
 * Loads and validates the active catalog and prints what it contains.
 */
export async function checkCommand(options: CatalogOptions): Promise<void> {
    const location = resolveCatalogLocation(options);
    info(`Checking catalog: ${location.path} (${location.origin})`);

    let loaded: CatalogLoadResult;
    try {
        loaded = loadCatalogFile(location.path);
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }

    const { catalog, warnings } = loaded;
    for (const w of warnings) {
        warn(w);
    }

    for (const category of catalog.categories) {
        const count = catalog.keywords.get(category)?.length ?? 0;
        const marker = category === catalog.defaultCategory ? ' (default)' : '';
        arrow(`${category}${marker}: ${count} keyword${count === 1 ? '' : 's'}`);
    }
    arrow(`Overrides: ${catalog.overrides.size}`);
    arrow(`Stop words: ${catalog.stopWords.size}`);

    success(`Catalog is valid${warnings.length > 0 ? ` (${warnings.length} warning${warnings.length === 1 ? '' : 's'})` : ''}.`);
}
