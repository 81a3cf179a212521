import { Document, parseDocument, isMap, isSeq, isScalar, type YAMLMap } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import { loadCatalog, type CatalogLoadResult } from '@txclass/core';

const NEW_CATALOG_HEADER = ' Transaction classification catalog';

/**
 * Adds a keyword under a category in a YAML catalog while preserving
 * comments and layout. The category key is matched case-insensitively.
 *
 * @returns Load result of the edited catalog (validated before writing)
 */
export async function appendKeywordToYaml(
    filePath: string,
    category: string,
    keyword: string
): Promise<CatalogLoadResult> {
    return editCatalogYaml(filePath, (doc, root) => {
        const keywords = root.get('keywords');
        if (keywords === undefined || keywords === null) {
            root.set('keywords', doc.createNode({ [category]: [keyword] }));
            return;
        }
        if (!isMap(keywords)) {
            throw new Error(`Invalid YAML structure in ${filePath}: "keywords" must be a mapping.`);
        }

        const key = findKey(keywords, category) ?? category;
        const list = keywords.get(key);
        if (list === undefined || list === null) {
            keywords.set(key, doc.createNode([keyword]));
        } else if (isSeq(list)) {
            list.add(doc.createNode(keyword));
        } else {
            throw new Error(`Invalid YAML structure in ${filePath}: keywords.${key} must be a list.`);
        }
    });
}

/**
 * Adds an exact-phrase override, in whichever form (mapping or list) the
 * file already uses.
 *
 * @returns Load result of the edited catalog (validated before writing)
 */
export async function appendOverrideToYaml(
    filePath: string,
    phrase: string,
    category: string
): Promise<CatalogLoadResult> {
    return editCatalogYaml(filePath, (doc, root) => {
        const overrides = root.get('overrides');
        if (overrides === undefined || overrides === null) {
            root.set('overrides', doc.createNode({ [phrase]: category }));
        } else if (isMap(overrides)) {
            overrides.set(phrase, category);
        } else if (isSeq(overrides)) {
            overrides.add(doc.createNode({ phrase, category }));
        } else {
            throw new Error(`Invalid YAML structure in ${filePath}: "overrides" must be a mapping or a list.`);
        }
    });
}

/**
 * Read, edit, validate, then write. The file is only written when the
 * edited document still loads as a catalog.
 */
async function editCatalogYaml(
    filePath: string,
    edit: (doc: Document, root: YAMLMap) => void
): Promise<CatalogLoadResult> {
    let doc: Document;
    try {
        doc = parseDocument(await readFile(filePath, 'utf8'));
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            doc = new Document({});
            doc.commentBefore = NEW_CATALOG_HEADER;
        } else {
            throw err;
        }
    }
    if (doc.errors.length > 0) {
        throw new Error(`Invalid YAML in ${filePath}: ${doc.errors[0].message}`);
    }

    let root = doc.contents;
    if (root === null || (isScalar(root) && root.value === null)) {
        doc.contents = doc.createNode({});
        root = doc.contents;
    }
    if (!isMap(root)) {
        throw new Error(`Invalid YAML structure in ${filePath}: catalog must be a mapping.`);
    }

    edit(doc, root);

    // Throws ConfigError and leaves the file untouched if the edit broke it
    const result = loadCatalog(doc.toJS());
    await writeFile(filePath, doc.toString());
    return result;
}

function findKey(map: YAMLMap, name: string): string | undefined {
    const wanted = name.trim().toLowerCase();
    for (const pair of map.items) {
        const key = isScalar(pair.key) ? pair.key.value : pair.key;
        if (typeof key === 'string' && key.trim().toLowerCase() === wanted) {
            return key;
        }
    }
    return undefined;
}
