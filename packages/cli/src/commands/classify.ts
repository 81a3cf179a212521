import { classify, parseAmount } from '@txclass/core';
import { loadCatalogOrExit } from '../workspace/config.js';
import { log, arrow, fail } from '../utils/console.js';
import type { ClassifyOptions } from '../types.js';

/**
 * Classifies one description and prints the result.
 */
export async function classifyCommand(words: string[], options: ClassifyOptions): Promise<void> {
    const description = words.join(' ');

    let amount: number | null = null;
    if (options.amount !== undefined) {
        amount = parseAmount(options.amount);
        if (amount === null) {
            fail(`Invalid amount "${options.amount}".`);
        }
    }

    const { catalog } = loadCatalogOrExit(options);
    const result = classify(description, catalog, amount);

    if (options.json) {
        log(JSON.stringify(result, null, 2));
        return;
    }

    log(`${result.category} (${result.confidence.toFixed(2)})`);
    arrow(`Method:  ${result.method}`);
    if (result.matched_term !== null) {
        arrow(`Matched: "${result.matched_term}" (${result.hit_count} hit${result.hit_count === 1 ? '' : 's'})`);
    }
}
