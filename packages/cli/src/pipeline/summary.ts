import type { ClassificationStats } from '@txclass/core';
import type { PipelineState } from './types.js';

/**
 * Contents of summary.json for a batch run.
 */
export interface BatchSummary {
    input_file: string;
    catalog_file: string | null;
    run_timestamp: string;
    row_count: number;
    skipped_rows: number;
    review_count: number;
    stats: ClassificationStats | null;
    totals: Record<string, string>;
    warnings: string[];
}

/**
 * Totals are fixed two-place decimal strings, so no float noise reaches
 * the file.
 */
export function buildSummary(state: PipelineState, now: Date = new Date()): BatchSummary {
    const stats = state.stats ?? null;
    return {
        input_file: state.inputPath,
        catalog_file: state.location?.path ?? null,
        run_timestamp: now.toISOString(),
        row_count: state.classified.length,
        skipped_rows: state.skippedRows,
        review_count: stats ? stats.byMethod.default_other + stats.byMethod.empty_normalized : 0,
        stats,
        totals: Object.fromEntries([...state.totals].map(([category, total]) => [category, total.toFixed(2)])),
        warnings: [...state.warnings],
    };
}
