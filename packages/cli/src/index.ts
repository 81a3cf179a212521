#!/usr/bin/env node
/**
 * txclass CLI
 *
 * The core is headless: this package owns every file read, file write and
 * console line. Core returns warnings as data and the commands print them.
 */

import { Command } from 'commander';
import { classifyCommand } from './commands/classify.js';
import { batchCommand } from './commands/batch.js';
import { checkCommand } from './commands/check.js';
import { addKeyword } from './commands/add-keyword.js';
import { addOverride } from './commands/add-override.js';
import { fail } from './utils/console.js';

const program = new Command();

program
    .name('txclass')
    .description('Rule-based transaction description classifier')
    .version('1.0.0')
    .option('-w, --workspace <path>', 'Workspace root (default: detected from the current directory)');

program
    .command('classify')
    .description('Classify a single transaction description')
    .argument('<description...>', 'Description text; several words are joined with spaces')
    .option('-a, --amount <amount>', 'Transaction amount (accepted, not used for classification)')
    .option('-c, --catalog <path>', 'Catalog file (YAML or JSON)')
    .option('--json', 'Print the result as JSON', false)
    .action(async (description: string[], opts: { amount?: string; catalog?: string; json: boolean }) => {
        await classifyCommand(description, { ...opts, workspace: program.opts<{ workspace?: string }>().workspace });
    });

program
    .command('batch')
    .description('Classify every row of a CSV or XLSX export and write reports')
    .argument('<file>', 'Input sheet with a Description column and an optional Amount column')
    .option('-c, --catalog <path>', 'Catalog file (YAML or JSON)')
    .option('-o, --out <dir>', 'Output directory')
    .option('--dry-run', 'Classify without writing any files', false)
    .option('--json', 'Print the run summary as JSON', false)
    .action(async (file: string, opts: { catalog?: string; out?: string; dryRun: boolean; json: boolean }) => {
        await batchCommand(file, { ...opts, workspace: program.opts<{ workspace?: string }>().workspace });
    });

program
    .command('check')
    .description('Validate the catalog and list keyword counts per category')
    .option('-c, --catalog <path>', 'Catalog file (YAML or JSON)')
    .action(async (opts: { catalog?: string }) => {
        await checkCommand({ ...opts, workspace: program.opts<{ workspace?: string }>().workspace });
    });

program
    .command('add-keyword')
    .description('Add a keyword to a category in the YAML catalog')
    .argument('<category>', 'Category name')
    .argument('<keyword>', 'Keyword or multi-word phrase')
    .option('-c, --catalog <path>', 'Catalog file (YAML)')
    .action(async (category: string, keyword: string, opts: { catalog?: string }) => {
        await addKeyword(category, keyword, { ...opts, workspace: program.opts<{ workspace?: string }>().workspace });
    });

program
    .command('add-override')
    .description('Map an exact normalized description to a category')
    .argument('<phrase>', 'Full description the override matches')
    .argument('<category>', 'Category name')
    .option('-c, --catalog <path>', 'Catalog file (YAML)')
    .action(async (phrase: string, category: string, opts: { catalog?: string }) => {
        await addOverride(phrase, category, { ...opts, workspace: program.opts<{ workspace?: string }>().workspace });
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    fail(err instanceof Error ? err.message : String(err));
});
