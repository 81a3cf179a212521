import { extname } from 'node:path';
import { normalizeDescription, type RuleCatalog } from '@txclass/core';
import { loadCatalogOrExit } from '../workspace/config.js';
import { appendKeywordToYaml } from '../yaml/catalog.js';
import { log, success, warn, arrow, fail } from '../utils/console.js';
import type { AddRuleOptions, CatalogLocation } from '../types.js';

/**
 * Only user-owned YAML catalogs are edited in place.
 */
export function assertEditable(location: CatalogLocation): void {
    if (location.origin === 'bundled') {
        fail(
            'No catalog configured; the bundled default catalog is read-only. ' +
                'Create config/catalog.yaml in your workspace or pass --catalog <path>.'
        );
    }
    if (extname(location.path).toLowerCase() === '.json') {
        fail(`Cannot edit JSON catalog ${location.path}; convert it to YAML first.`);
    }
}

/**
 * Canonical spelling of a category in the catalog, matched case-insensitively.
 */
export function resolveCategory(catalog: RuleCatalog, name: string): string {
    const wanted = name.trim().toLowerCase();
    const found = catalog.categories.find((c) => c.toLowerCase() === wanted);
    if (!found) {
        fail(`Unknown category "${name}". Known categories: ${catalog.categories.join(', ')}`);
    }
    return found;
}

export async function addKeyword(category: string, keyword: string, options: AddRuleOptions): Promise<void> {
    const { catalog, location } = loadCatalogOrExit(options);
    assertEditable(location);

    const target = resolveCategory(catalog, category);
    const normalized = normalizeDescription(keyword);
    if (normalized.kind === 'empty') {
        fail(`Keyword "${keyword}" has no usable words after normalization.`);
    }

    for (const [owner, entries] of catalog.keywords) {
        if (!entries.some((e) => e.keyword === normalized.text)) continue;
        if (owner === target) {
            warn(`Keyword "${normalized.text}" is already listed under ${target}. Nothing to do.`);
            return;
        }
        warn(`Keyword "${normalized.text}" is already listed under ${owner}; adding it to ${target} as well.`);
    }

    log(`Adding keyword to: ${location.path}`);

    try {
        const { warnings } = await appendKeywordToYaml(location.path, target, keyword.trim());
        for (const w of warnings) {
            warn(w);
        }
        success('Keyword successfully added!');
        arrow(`Keyword:  "${keyword.trim()}"`);
        arrow(`Category: ${target}`);
    } catch (err) {
        fail(`Failed to add keyword: ${err instanceof Error ? err.message : String(err)}`);
    }
}
