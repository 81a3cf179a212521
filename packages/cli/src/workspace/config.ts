import { readFileSync, existsSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { parse, YAMLError } from 'yaml';
import { loadCatalog, ConfigError, type CatalogLoadResult } from '@txclass/core';
import { detectWorkspaceRoot } from './detect.js';
import { resolveWorkspace, resolveBundledCatalogPath } from './paths.js';
import { warn, fail } from '../utils/console.js';
import type { CatalogOptions, CatalogLocation } from '../types.js';

export const CATALOG_ENV_VAR = 'TXCLASS_CATALOG';

/**
 * Picks the catalog file to use.
 *
 * Precedence: --catalog flag, TXCLASS_CATALOG, workspace config/catalog.yaml,
 * bundled default catalog.
 */
export function resolveCatalogLocation(
    options: CatalogOptions,
    env: NodeJS.ProcessEnv = process.env
): CatalogLocation {
    if (options.catalog) {
        return { path: resolve(options.catalog), origin: 'flag' };
    }
    const fromEnv = env[CATALOG_ENV_VAR];
    if (fromEnv) {
        return { path: resolve(fromEnv), origin: 'env' };
    }
    const root = options.workspace ?? detectWorkspaceRoot();
    if (root) {
        const workspace = resolveWorkspace(root);
        if (existsSync(workspace.config.catalogPath)) {
            return { path: workspace.config.catalogPath, origin: 'workspace' };
        }
    }
    return { path: resolveBundledCatalogPath(), origin: 'bundled' };
}

/**
 * Reads a catalog document (.json or YAML) without validating it.
 * Unreadable syntax, including duplicate YAML keys, is a ConfigError.
 */
export function readCatalogSource(path: string): unknown {
    if (!existsSync(path)) {
        throw new Error(`Catalog file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');

    try {
        if (extname(path).toLowerCase() === '.json') {
            const data: unknown = JSON.parse(content);
            return data;
        }
        const data: unknown = parse(content);
        return data;
    } catch (err) {
        if (err instanceof SyntaxError || err instanceof YAMLError) {
            throw new ConfigError([`${path}: ${err.message}`]);
        }
        throw err;
    }
}

/**
 * Reads and validates a catalog file.
 *
 * @throws ConfigError for invalid content, Error when the file is missing
 */
export function loadCatalogFile(path: string): CatalogLoadResult {
    return loadCatalog(readCatalogSource(path));
}

/**
 * Command helper: resolve, load and report the catalog, exiting on failure.
 */
export function loadCatalogOrExit(options: CatalogOptions): CatalogLoadResult & { location: CatalogLocation } {
    const location = resolveCatalogLocation(options);
    try {
        const loaded = loadCatalogFile(location.path);
        for (const w of loaded.warnings) {
            warn(w);
        }
        return { ...loaded, location };
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return fail(`Failed to load catalog ${location.path}. ${message}`);
    }
}
