import type Decimal from 'decimal.js';
import type {
    ClassificationResult,
    ClassificationStats,
    RuleCatalog,
    SheetRow,
} from '@txclass/core';
import type { BatchOptions, CatalogLocation } from '../types.js';

/**
 * One input row together with its classification.
 */
export interface ClassifiedRow extends SheetRow {
    result: ClassificationResult;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * State object passed through the batch pipeline.
 */
export interface PipelineState {
    inputPath: string;
    outputPath: string;
    options: BatchOptions;

    // Accumulated during pipeline execution
    location?: CatalogLocation;
    catalog?: RuleCatalog;
    rows: SheetRow[];
    skippedRows: number;
    classified: ClassifiedRow[];
    stats?: ClassificationStats;
    totals: Map<string, Decimal>;
    writtenFiles: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
