/**
 * Description normalization for rule matching.
 *
 * Both sides of every comparison go through here: raw descriptions at
 * classify time, keywords and override phrases at catalog load time.
 */

/**
 * Normalized description. The empty variant is a sentinel distinct from
 * any real text: the raw input was blank, symbolic, purely numeric, or
 * made only of stop words.
 */
export type NormalizedText =
    | { readonly kind: 'text'; readonly text: string; readonly tokens: readonly string[] }
    | { readonly kind: 'empty' };

export const EMPTY_NORMALIZED: NormalizedText = Object.freeze({ kind: 'empty' as const });

export interface NormalizeOptions {
    stopWords?: ReadonlySet<string>;
}

const CAMEL_BOUNDARY = /(\p{Ll})(\p{Lu})/gu;
const LATIN_MARKS = /(\p{Script=Latin})\p{M}+/gu;
const APOSTROPHES = /['’]/g;
const NON_WORD = /[^\p{L}\p{M}\p{N}\s]/gu;
const WHITESPACE = /\s+/g;
const NUMERIC_TOKEN = /^\p{N}+$/u;

/**
 * Normalize a raw transaction description.
 *
 * Transformations:
 * - Unicode NFKC
 * - Split camelCase runs ("StarbucksCoffee" -> "Starbucks Coffee")
 * - Lowercase, then fold accents and dotted forms on Latin letters
 *   ("CAFÉ" -> "cafe", "İSTANBUL" -> "istanbul") and "ß" to "ss"
 * - Drop apostrophes ("O'Reilly" -> "oreilly")
 * - Replace punctuation, symbols, currency signs and control characters with space
 * - Collapse whitespace, trim
 * - Remove stop words
 *
 * Keywords go through the same steps, so a keyword written "eBay" is
 * stored as "e bay" and a description "EBAY" does not match it. Write
 * keywords in lowercase.
 *
 * Never throws.
 */
export function normalizeDescription(raw: string, options: NormalizeOptions = {}): NormalizedText {
    const cleaned = raw
        .normalize('NFKC')
        .replace(CAMEL_BOUNDARY, '$1 $2')
        .toLowerCase()
        .normalize('NFKD')
        .replace(LATIN_MARKS, '$1')
        .normalize('NFC')
        .replace(/ß/g, 'ss')
        .replace(APOSTROPHES, '')
        .replace(NON_WORD, ' ')
        .replace(WHITESPACE, ' ')
        .trim();

    if (cleaned === '') return EMPTY_NORMALIZED;

    const stopWords = options.stopWords;
    const tokens = cleaned
        .split(' ')
        .filter((token) => !stopWords || !stopWords.has(token));

    // An amount pasted into the description field is not a description
    if (tokens.length === 0 || tokens.every((token) => NUMERIC_TOKEN.test(token))) {
        return EMPTY_NORMALIZED;
    }

    const normalized: NormalizedText = { kind: 'text', text: tokens.join(' '), tokens: Object.freeze(tokens) };
    return Object.freeze(normalized);
}

export function isEmptyNormalized(text: NormalizedText): text is { readonly kind: 'empty' } {
    return text.kind === 'empty';
}
