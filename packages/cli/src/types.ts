/**
 * txclass CLI - Core Types
 */

/**
 * Options every command that reads a catalog accepts.
 */
export interface CatalogOptions {
    catalog?: string;
    workspace?: string;
}

export interface ClassifyOptions extends CatalogOptions {
    amount?: string;
    json: boolean;
}

export interface BatchOptions extends CatalogOptions {
    out?: string;
    dryRun: boolean;
    json: boolean;
}

export type AddRuleOptions = CatalogOptions;

export interface WorkspaceConfig {
    catalogPath: string;
}

export interface Workspace {
    root: string;
    imports: string;
    outputs: string;
    config: WorkspaceConfig;
}

/**
 * Where the active catalog file was found.
 */
export type CatalogOrigin = 'flag' | 'env' | 'workspace' | 'bundled';

export interface CatalogLocation {
    path: string;
    origin: CatalogOrigin;
}
