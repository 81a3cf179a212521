/**
 * Sheet header helpers.
 */

/**
 * Strip a leading UTF-8 byte order mark. Exports from spreadsheet tools
 * often prefix the first header with one, which breaks column lookup.
 */
export function stripBom(value: string): string {
    return value.startsWith('\uFEFF') ? value.slice(1) : value;
}
