import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'yaml';
import { ConfigError } from '@txclass/core';
import { appendKeywordToYaml, appendOverrideToYaml } from '../src/yaml/catalog.js';

describe('YAML catalog editing', () => {
    let dir: string;
    let file: string;

    const initialContent = `# Household catalog
keywords:
  # morning habits
  Food:
    - coffee
  Transport:
    - uber

overrides:
  groceries and toiletries: Food
`;

    beforeEach(async () => {
        dir = mkdtempSync(join(tmpdir(), 'txclass-yaml-'));
        file = join(dir, 'catalog.yaml');
        await fs.writeFile(file, initialContent, 'utf8');
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe('appendKeywordToYaml', () => {
        it('appends a keyword while preserving comments', async () => {
            await appendKeywordToYaml(file, 'Food', 'bakery');

            const updated = await fs.readFile(file, 'utf8');
            expect(updated).toContain('# Household catalog');
            expect(updated).toContain('# morning habits');
            expect(parse(updated).keywords.Food).toEqual(['coffee', 'bakery']);
        });

        it('matches the category key case-insensitively', async () => {
            await appendKeywordToYaml(file, 'transport', 'metro');

            const data = parse(await fs.readFile(file, 'utf8'));
            expect(data.keywords.Transport).toEqual(['uber', 'metro']);
            expect(data.keywords.transport).toBeUndefined();
        });

        it('creates a list for a category without keywords', async () => {
            const result = await appendKeywordToYaml(file, 'Rent', 'landlord');

            expect(parse(await fs.readFile(file, 'utf8')).keywords.Rent).toEqual(['landlord']);
            expect(result.catalog.keywords.get('Rent')).toEqual([{ keyword: 'landlord', tokens: ['landlord'] }]);
        });

        it('creates the catalog file when it does not exist', async () => {
            const fresh = join(dir, 'new.yaml');
            await appendKeywordToYaml(fresh, 'Food', 'pizza');

            const content = await fs.readFile(fresh, 'utf8');
            expect(content.startsWith('# Transaction classification catalog')).toBe(true);
            expect(parse(content)).toEqual({ keywords: { Food: ['pizza'] } });
        });

        it('does not write an edit that breaks the catalog', async () => {
            await expect(appendKeywordToYaml(file, 'Groceries', 'milk')).rejects.toThrow(ConfigError);
            expect(await fs.readFile(file, 'utf8')).toBe(initialContent);
        });

        it('does not create a file for a rejected edit', async () => {
            const fresh = join(dir, 'rejected.yaml');
            await expect(appendKeywordToYaml(fresh, 'Food', '!!!')).rejects.toThrow(ConfigError);
            expect(existsSync(fresh)).toBe(false);
        });
    });

    describe('appendOverrideToYaml', () => {
        it('adds to a mapping of overrides', async () => {
            await appendOverrideToYaml(file, 'monthly rent payment', 'Rent');

            const updated = await fs.readFile(file, 'utf8');
            expect(updated).toContain('# Household catalog');
            expect(parse(updated).overrides).toEqual({
                'groceries and toiletries': 'Food',
                'monthly rent payment': 'Rent',
            });
        });

        it('adds to a list of overrides', async () => {
            await fs.writeFile(file, 'overrides:\n  - phrase: coffee beans\n    category: Shopping\n', 'utf8');

            const result = await appendOverrideToYaml(file, 'bus pass', 'Transport');

            expect(parse(await fs.readFile(file, 'utf8')).overrides).toEqual([
                { phrase: 'coffee beans', category: 'Shopping' },
                { phrase: 'bus pass', category: 'Transport' },
            ]);
            expect(result.catalog.overrides.get('bus pass')).toBe('Transport');
        });

        it('creates the overrides section', async () => {
            await fs.writeFile(file, 'keywords:\n  Food: [coffee]\n', 'utf8');
            await appendOverrideToYaml(file, 'savings account transfer', 'Transfer');

            expect(parse(await fs.readFile(file, 'utf8')).overrides).toEqual({
                'savings account transfer': 'Transfer',
            });
        });
    });

    it('refuses documents whose root is not a mapping', async () => {
        await fs.writeFile(file, '- coffee\n', 'utf8');
        await expect(appendKeywordToYaml(file, 'Food', 'tea')).rejects.toThrow('catalog must be a mapping');
    });
});
