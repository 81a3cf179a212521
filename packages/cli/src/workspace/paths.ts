import { join, dirname, basename, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        imports: join(root, 'imports'),
        outputs: join(root, 'outputs'),
        config: {
            catalogPath: join(root, 'config', 'catalog.yaml'),
        },
    };
}

/**
 * Catalog shipped with the CLI, used when nothing else is configured.
 */
export function resolveBundledCatalogPath(): string {
    // src/workspace (dev) or dist/workspace (built) -> package root
    return join(__dirname, '..', '..', 'assets', 'default-catalog.yaml');
}

/**
 * Output directory for a batch run of inputPath.
 * Inside a workspace: outputs/<stem>. Otherwise: <stem>-classified next to the input.
 */
export function getBatchOutputPath(inputPath: string, workspace: Workspace | null): string {
    const stem = basename(inputPath, extname(inputPath));
    return workspace ? join(workspace.outputs, stem) : join(dirname(inputPath), `${stem}-classified`);
}
