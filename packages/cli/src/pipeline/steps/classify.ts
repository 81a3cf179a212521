import Decimal from 'decimal.js';
import { classifyAll } from '@txclass/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Classification
 * Classifies every row against one catalog snapshot and totals amounts per
 * category.
 */
export const classifyRows: PipelineStep = async (state) => {
    if (!state.catalog) {
        state.errors.push({ step: 'classify', message: 'No catalog loaded.', fatal: true });
        return state;
    }

    const { results, stats } = classifyAll(state.rows, state.catalog);
    state.stats = stats;
    state.classified = state.rows.map((row, i) => ({ ...row, result: results[i] }));

    const totals = new Map<string, Decimal>(state.catalog.categories.map((c) => [c, new Decimal(0)]));
    for (const row of state.classified) {
        if (row.amount === null) continue;
        const current = totals.get(row.result.category) ?? new Decimal(0);
        totals.set(row.result.category, current.plus(row.amount));
    }
    state.totals = totals;

    return state;
};
