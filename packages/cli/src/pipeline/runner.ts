import type { PipelineState, PipelineStep } from './types.js';
import { loadCatalogStep } from './steps/load-catalog.js';
import { parseInput } from './steps/parse.js';
import { classifyRows } from './steps/classify.js';
import { exportResults } from './steps/export.js';
import { arrow } from '../utils/console.js';
import type { BatchOptions } from '../types.js';

/**
 * Creates the initial pipeline state for one input file.
 */
export function createPipelineState(inputPath: string, outputPath: string, options: BatchOptions): PipelineState {
    return {
        inputPath,
        outputPath,
        options,
        rows: [],
        skippedRows: 0,
        classified: [],
        totals: new Map(),
        writtenFiles: [],
        warnings: [],
        errors: [],
    };
}

/**
 * Orchestrates the batch pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    inputPath: string,
    outputPath: string,
    options: BatchOptions
): Promise<PipelineState> {
    let state = createPipelineState(inputPath, outputPath, options);

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Load Catalog', fn: loadCatalogStep },
        { name: 'Parsing', fn: parseInput },
        { name: 'Classification', fn: classifyRows },
        { name: 'Export Results', fn: exportResults },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        // --json keeps stdout for the summary document
        if (!options.json) {
            arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);
        }

        state = await step.fn(state);

        if (state.errors.some((e) => e.fatal)) {
            break;
        }
    }

    return state;
}
