import type { PipelineStep } from '../types.js';
import { resolveCatalogLocation, loadCatalogFile } from '../../workspace/config.js';

/**
 * Step 1: Load Catalog
 * Resolves the catalog file and validates it before any row is read.
 */
export const loadCatalogStep: PipelineStep = async (state) => {
    const location = resolveCatalogLocation(state.options);
    state.location = location;

    try {
        const { catalog, warnings } = loadCatalogFile(location.path);
        state.catalog = catalog;
        for (const warning of warnings) {
            state.warnings.push(`[catalog] ${warning}`);
        }
    } catch (err) {
        state.errors.push({
            step: 'load-catalog',
            message: `Failed to load catalog ${location.path}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
