import { normalizeDescription } from '@txclass/core';
import { loadCatalogOrExit } from '../workspace/config.js';
import { appendOverrideToYaml } from '../yaml/catalog.js';
import { assertEditable, resolveCategory } from './add-keyword.js';
import { log, success, warn, arrow, fail } from '../utils/console.js';
import type { AddRuleOptions } from '../types.js';

export async function addOverride(phrase: string, category: string, options: AddRuleOptions): Promise<void> {
    const { catalog, location } = loadCatalogOrExit(options);
    assertEditable(location);

    const target = resolveCategory(catalog, category);
    const normalized = normalizeDescription(phrase);
    if (normalized.kind === 'empty') {
        fail(`Phrase "${phrase}" has no usable words after normalization.`);
    }

    const existing = catalog.overrides.get(normalized.text);
    if (existing === target) {
        warn(`Override "${normalized.text}" -> ${target} already exists. Nothing to do.`);
        return;
    }
    if (existing !== undefined) {
        fail(`Override "${normalized.text}" already maps to ${existing}. Edit ${location.path} to change it.`);
    }

    log(`Adding override to: ${location.path}`);

    try {
        const { warnings } = await appendOverrideToYaml(location.path, phrase.trim(), target);
        for (const w of warnings) {
            warn(w);
        }
        success('Override successfully added!');
        arrow(`Phrase:   "${phrase.trim()}"`);
        arrow(`Category: ${target}`);
    } catch (err) {
        fail(`Failed to add override: ${err instanceof Error ? err.message : String(err)}`);
    }
}
