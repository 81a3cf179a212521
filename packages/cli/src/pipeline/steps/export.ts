import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { PipelineStep } from '../types.js';
import { buildSummary } from '../summary.js';
import { generateResultsExcel } from '../../excel/results.js';
import { generateReviewExcel } from '../../excel/review.js';

/**
 * Step 4: Export
 * Writes results.xlsx, review.xlsx and summary.json to the output directory.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const outputPath = state.outputPath;

    try {
        await mkdir(outputPath, { recursive: true });

        const resultsFile = join(outputPath, 'results.xlsx');
        const resultsWb = await generateResultsExcel(state.classified, state.totals);
        await resultsWb.xlsx.writeFile(resultsFile);
        state.writtenFiles.push(resultsFile);

        const reviewFile = join(outputPath, 'review.xlsx');
        const reviewWb = await generateReviewExcel(state.classified);
        await reviewWb.xlsx.writeFile(reviewFile);
        state.writtenFiles.push(reviewFile);

        const summaryFile = join(outputPath, 'summary.json');
        await writeFile(summaryFile, JSON.stringify(buildSummary(state), null, 2));
        state.writtenFiles.push(summaryFile);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${outputPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
