/**
 * Rule catalog loading and validation.
 *
 * ARCHITECTURAL NOTE: No console.* calls and no file access. The caller
 * parses YAML/JSON and hands over the document; warnings are returned as
 * data. Any error aborts the whole load so a half-valid catalog never
 * exists.
 */

import { normalizeDescription } from '../utils/normalize.js';
import { ConfigError } from './errors.js';
import {
    CatalogSourceSchema,
    DEFAULT_CATEGORIES,
    FALLBACK_CATEGORY,
} from '../types/index.js';
import type { Category, CatalogSource, KeywordEntry, RuleCatalog } from '../types/index.js';

export interface CatalogLoadResult {
    catalog: RuleCatalog;
    warnings: string[];
}

/**
 * Build a RuleCatalog from a parsed configuration document.
 *
 * A null/undefined document (e.g. an empty YAML file) yields the default
 * category set with no rules.
 *
 * @throws ConfigError listing every problem found
 */
export function loadCatalog(source: unknown): CatalogLoadResult {
    const parsed = CatalogSourceSchema.safeParse(source ?? {});
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return buildCatalog(parsed.data);
}

function buildCatalog(src: CatalogSource): CatalogLoadResult {
    const issues: string[] = [];
    const warnings: string[] = [];

    // 1. Category set. Lookup is case-insensitive, stored spelling is canonical.
    const categories: Category[] = [];
    const byLowerName = new Map<string, Category>();
    for (const raw of src.categories ?? DEFAULT_CATEGORIES) {
        const name = raw.trim();
        const key = name.toLowerCase();
        if (byLowerName.has(key)) {
            issues.push(`categories: duplicate category "${name}"`);
            continue;
        }
        byLowerName.set(key, name);
        categories.push(name);
    }
    if (!byLowerName.has(FALLBACK_CATEGORY.toLowerCase())) {
        warnings.push(`Category "${FALLBACK_CATEGORY}" missing from category list; appended as fallback.`);
        byLowerName.set(FALLBACK_CATEGORY.toLowerCase(), FALLBACK_CATEGORY);
        categories.push(FALLBACK_CATEGORY);
    }
    const resolve = (name: string): Category | undefined => byLowerName.get(name.trim().toLowerCase());
    const fallbackCategory = resolve(FALLBACK_CATEGORY) ?? FALLBACK_CATEGORY;

    // 2. Default category
    const defaultName = src.default_category ?? FALLBACK_CATEGORY;
    const defaultCategory = resolve(defaultName);
    if (!defaultCategory) {
        issues.push(`default_category: unknown category "${defaultName}"`);
    }

    // 3. Keywords (normalized without stop words; conflicts handled in step 5)
    const keywordsByCategory = new Map<Category, KeywordEntry[]>(categories.map((c) => [c, []]));
    const keywordOwners = new Map<string, Category[]>();
    const usedTokens = new Set<string>();

    for (const [rawCategory, keywords] of Object.entries(src.keywords)) {
        const category = resolve(rawCategory);
        if (!category) {
            issues.push(`keywords: unknown category "${rawCategory}"`);
            continue;
        }
        const entries = keywordsByCategory.get(category) ?? [];
        keywords.forEach((keyword, index) => {
            const normalized = normalizeDescription(keyword);
            if (normalized.kind === 'empty') {
                issues.push(`keywords.${rawCategory}[${index}]: keyword "${keyword}" is empty after normalization`);
                return;
            }
            if (entries.some((e) => e.keyword === normalized.text)) return;

            entries.push(Object.freeze({ keyword: normalized.text, tokens: normalized.tokens }));
            normalized.tokens.forEach((t) => usedTokens.add(t));
            const owners = keywordOwners.get(normalized.text) ?? [];
            owners.push(category);
            keywordOwners.set(normalized.text, owners);
        });
        keywordsByCategory.set(category, entries);
    }

    for (const [keyword, owners] of keywordOwners) {
        if (owners.length > 1) {
            warnings.push(`Keyword "${keyword}" is listed under several categories: ${owners.join(', ')}`);
        }
    }

    // 4. Overrides
    const overrides = new Map<string, Category>();
    const overrideEntries = Array.isArray(src.overrides)
        ? src.overrides
        : Object.entries(src.overrides).map(([phrase, category]) => ({ phrase, category }));

    for (const { phrase, category: rawCategory } of overrideEntries) {
        const category = resolve(rawCategory);
        if (!category) {
            issues.push(`overrides: unknown category "${rawCategory}" for phrase "${phrase}"`);
            continue;
        }
        const normalized = normalizeDescription(phrase);
        if (normalized.kind === 'empty') {
            issues.push(`overrides: phrase "${phrase}" is empty after normalization`);
            continue;
        }
        const existing = overrides.get(normalized.text);
        if (existing && existing !== category) {
            issues.push(`overrides: phrase "${normalized.text}" maps to both ${existing} and ${category}`);
            continue;
        }
        if (existing) {
            warnings.push(`Duplicate override "${normalized.text}" -> ${category}`);
            continue;
        }
        overrides.set(normalized.text, category);
        normalized.tokens.forEach((t) => usedTokens.add(t));
    }

    // 5. Stop words. A word a rule depends on is never stripped.
    const stopWords = new Set<string>();
    for (const word of src.stop_words) {
        const normalized = normalizeDescription(word);
        if (normalized.kind === 'empty' || normalized.tokens.length !== 1) {
            issues.push(`stop_words: "${word}" must normalize to a single word`);
            continue;
        }
        const token = normalized.text;
        if (usedTokens.has(token)) {
            warnings.push(`Stop word "${token}" ignored: used by a keyword or override`);
            continue;
        }
        stopWords.add(token);
    }

    if (issues.length > 0 || !defaultCategory) {
        throw new ConfigError(issues);
    }

    const catalog: RuleCatalog = {
        categories: Object.freeze(categories),
        defaultCategory,
        fallbackCategory,
        keywords: new Map(
            categories.map((c): [Category, readonly KeywordEntry[]] => [
                c,
                Object.freeze(keywordsByCategory.get(c) ?? []),
            ])
        ),
        overrides,
        stopWords,
        scoring: Object.freeze({
            baseline: src.scoring.baseline,
            tokenBase: src.scoring.token_base,
            tokenIncrement: src.scoring.token_increment,
            tokenCeiling: src.scoring.token_ceiling,
        }),
    };

    return { catalog: Object.freeze(catalog), warnings };
}
