import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { parseTransactionSheet } from '@txclass/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Parsing
 * Reads the input sheet into memory and hands the bytes to the core parser.
 */
export const parseInput: PipelineStep = async (state) => {
    const filename = basename(state.inputPath);

    try {
        const buffer = await readFile(state.inputPath);
        const arrayBuffer = buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);

        const result = parseTransactionSheet(arrayBuffer, filename);
        state.rows = result.rows;
        state.skippedRows = result.skippedRows;

        // Forward parser warnings to pipeline state
        state.warnings.push(...result.warnings);
    } catch (err) {
        state.errors.push({
            step: 'parse',
            message: `Failed to parse ${filename}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    if (state.rows.length === 0) {
        state.warnings.push(`No transactions found in ${filename}.`);
    }

    return state;
};
