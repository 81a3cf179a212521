import { describe, it, expect } from 'vitest';
import { normalizeDescription, isEmptyNormalized, EMPTY_NORMALIZED } from '../../src/utils/normalize.js';

function textOf(raw: string, stopWords?: string[]): string | null {
    const normalized = normalizeDescription(raw, { stopWords: stopWords ? new Set(stopWords) : undefined });
    return normalized.kind === 'text' ? normalized.text : null;
}

describe('normalizeDescription', () => {
    it('converts to lowercase', () => {
        expect(textOf('Starbucks Coffee')).toBe('starbucks coffee');
    });

    it('exposes tokens', () => {
        expect(normalizeDescription('Shell Gas Station')).toEqual({
            kind: 'text',
            text: 'shell gas station',
            tokens: ['shell', 'gas', 'station'],
        });
    });

    it('replaces punctuation and symbols with space', () => {
        expect(textOf('UBER*TRIP #123')).toBe('uber trip 123');
        expect(textOf('HELP.UBER.COM')).toBe('help uber com');
        expect(textOf('AMAZON-PRIME/BILL')).toBe('amazon prime bill');
    });

    it('drops apostrophes inside words', () => {
        expect(textOf("O'Reilly")).toBe('oreilly');
        expect(textOf('Sainsbury’s Local')).toBe('sainsburys local');
    });

    it('strips currency symbols', () => {
        expect(textOf('Coffee $4.85')).toBe('coffee 4 85');
        expect(textOf('€ Lunch £')).toBe('lunch');
    });

    it('collapses whitespace and trims', () => {
        expect(textOf('  Shell   Gas\tStation \n')).toBe('shell gas station');
    });

    it('replaces control characters', () => {
        expect(textOf('coffee\u0000shop')).toBe('coffee shop');
    });

    it('folds accents on Latin letters', () => {
        expect(textOf('CAFÉ ZÜRICH')).toBe('cafe zurich');
        expect(textOf('Crème Brûlée')).toBe('creme brulee');
    });

    it('folds case beyond simple lowercasing', () => {
        expect(textOf('İSTANBUL')).toBe('istanbul');
        expect(textOf('Straße')).toBe(textOf('STRASSE'));
    });

    it('keeps marks in non-Latin scripts', () => {
        expect(textOf('ガソリン')).toBe('ガソリン');
    });

    it('splits camelCase words', () => {
        expect(textOf('StarbucksCoffee')).toBe('starbucks coffee');
        expect(textOf('UberEats')).toBe('uber eats');
        expect(textOf("McDonald's")).toBe('mc donalds');
    });

    it('leaves all-caps words whole', () => {
        expect(textOf('NETFLIX.COM')).toBe('netflix com');
    });

    it('folds compatibility forms', () => {
        expect(textOf('ＳＴＡＲＢＵＣＫＳ')).toBe('starbucks');
    });

    it('drops emoji', () => {
        expect(textOf('☕ coffee')).toBe('coffee');
    });

    it('keeps mixed alphanumeric tokens', () => {
        expect(textOf('XYZ123')).toBe('xyz123');
    });

    it('removes stop words', () => {
        expect(textOf('Coffee at the Shop', ['at', 'the'])).toBe('coffee shop');
    });

    describe('empty sentinel', () => {
        it.each([
            ['empty string', ''],
            ['whitespace only', '   \t\n'],
            ['punctuation only', '***###!!!'],
            ['currency only', '$€£'],
            ['a bare amount', '52.30'],
            ['a formatted amount', '-$1,234.56'],
        ])('returns the sentinel for %s', (_label, raw) => {
            expect(normalizeDescription(raw)).toBe(EMPTY_NORMALIZED);
        });

        it('returns the sentinel when only stop words remain', () => {
            expect(normalizeDescription('The At', { stopWords: new Set(['the', 'at']) })).toBe(EMPTY_NORMALIZED);
        });

        it('is recognized by isEmptyNormalized', () => {
            expect(isEmptyNormalized(normalizeDescription(''))).toBe(true);
            expect(isEmptyNormalized(normalizeDescription('coffee'))).toBe(false);
        });
    });

    it('handles very long input', () => {
        const normalized = normalizeDescription('coffee '.repeat(10000));
        expect(normalized.kind).toBe('text');
        if (normalized.kind === 'text') {
            expect(normalized.tokens).toHaveLength(10000);
        }
    });

    it('is deterministic', () => {
        const raw = 'UBER *TRIP help.uber.com';
        expect(normalizeDescription(raw)).toEqual(normalizeDescription(raw));
    });
});
