import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace, getBatchOutputPath } from '../workspace/paths.js';
import { runPipeline } from '../pipeline/runner.js';
import { buildSummary } from '../pipeline/summary.js';
import { log, success, warn, arrow, fail } from '../utils/console.js';
import type { BatchOptions } from '../types.js';

export async function batchCommand(file: string, options: BatchOptions): Promise<void> {
    const inputPath = resolve(file);
    if (!existsSync(inputPath)) {
        fail(`Input file not found: ${inputPath}`);
    }

    const root = options.workspace ?? detectWorkspaceRoot();
    const workspace = root ? resolveWorkspace(root) : null;
    const outputPath = options.out ? resolve(options.out) : getBatchOutputPath(inputPath, workspace);

    if (!options.json) {
        log(`\ntxclass - Classifying ${inputPath}`);
    }

    const state = await runPipeline(inputPath, outputPath, options);

    const fatal = state.errors.some((e) => e.fatal);
    if (options.json && !fatal) {
        log(JSON.stringify(buildSummary(state), null, 2));
        return;
    }

    for (const w of state.warnings) {
        warn(w);
    }
    for (const e of state.errors) {
        console.error(`✖ ERROR [${e.step}]: ${e.message}`);
    }
    if (fatal) {
        fail('Batch classification failed.');
    }

    log('\n--- Batch Summary ---');
    success(`Classified ${state.classified.length} rows.`);
    if (state.location) {
        arrow(`Catalog: ${state.location.path} (${state.location.origin})`);
    }
    if (state.stats) {
        const { byMethod } = state.stats;
        arrow(
            `Overrides: ${byMethod.override}, keyword matches: ${byMethod.token_match}, ` +
                `fallback: ${byMethod.default_other}, empty: ${byMethod.empty_normalized}`
        );
    }
    for (const [category, total] of state.totals) {
        const count = state.stats?.byCategory[category] ?? 0;
        if (count > 0) {
            arrow(`${category}: ${count} rows, total ${total.toFixed(2)}`);
        }
    }

    if (options.dryRun) {
        log('\n[DRY RUN] No files were written.');
    } else {
        arrow(`Outputs saved to: ${outputPath}`);
    }
}
