/**
 * Transaction sheet parser for batch classification.
 *
 * Format:
 * - CSV or XLSX, first sheet, header row first
 * - "Description" column required ("Text" accepted), case-insensitive
 * - "Amount" column optional; kept for the caller, never used to classify
 */

import * as XLSX from 'xlsx';
import Decimal from 'decimal.js';
import { SheetRowSchema } from '@txclass/shared';
import type { SheetRow, SheetParseResult } from '../types/index.js';
import { stripBom } from '../utils/csv.js';

const DESCRIPTION_COLUMNS = ['description', 'text'];
const AMOUNT_COLUMNS = ['amount'];

/**
 * Parse a transaction export into rows to classify.
 *
 * @param data - File contents as ArrayBuffer
 * @param sourceFile - Original filename, used in messages
 * @returns Rows, warnings and skip count
 * @throws Error when no description column exists
 */
export function parseTransactionSheet(data: ArrayBuffer, sourceFile: string): SheetParseResult {
    const workbook = XLSX.read(data, { type: 'array' });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
        return { rows: [], warnings: [`${sourceFile}: no sheets found`], skippedRows: 0 };
    }

    const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null }).map((record) => {
        const clean: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(record)) {
            clean[stripBom(k).trim().toLowerCase()] = v;
        }
        return clean;
    });

    const rows: SheetRow[] = [];
    const warnings: string[] = [];
    let skippedRows = 0;

    if (records.length === 0) {
        return { rows, warnings, skippedRows };
    }

    const columns = Object.keys(records[0]);
    const descriptionKey = DESCRIPTION_COLUMNS.find((c) => columns.includes(c));
    if (!descriptionKey) {
        throw new Error(
            `${sourceFile}: Missing required column: Description. Found: ${columns.join(', ')}`
        );
    }
    const amountKey = AMOUNT_COLUMNS.find((c) => columns.includes(c));

    records.forEach((record, index) => {
        // Header is line 1
        const line = index + 2;
        const rawDescription = record[descriptionKey];
        if (rawDescription === null || rawDescription === undefined) {
            skippedRows++;
            return;
        }

        let amount: number | null = null;
        if (amountKey) {
            const rawAmount = record[amountKey];
            amount = parseAmount(rawAmount);
            if (amount === null && rawAmount !== null && String(rawAmount).trim() !== '') {
                warnings.push(`${sourceFile} line ${line}: invalid amount "${String(rawAmount)}", kept as empty`);
            }
        }

        rows.push(SheetRowSchema.parse({ row: line, description: String(rawDescription), amount }));
    });

    if (skippedRows) {
        warnings.push(`${sourceFile}: skipped ${skippedRows} rows with no description`);
    }

    return { rows, warnings, skippedRows };
}

/**
 * Parse an amount cell. Accepts numbers and strings such as "$1,234.50",
 * "-12.00" and "(12.00)". Returns null for blanks and garbage.
 */
export function parseAmount(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value !== 'string') return null;

    let text = value.trim();
    if (text === '') return null;

    let negative = false;
    if (text.startsWith('(') && text.endsWith(')')) {
        negative = true;
        text = text.slice(1, -1);
    }
    text = text.replace(/[\s,$€£¥]/g, '');

    try {
        const amount = new Decimal(text);
        if (!amount.isFinite()) return null;
        return (negative ? amount.negated() : amount).toNumber();
    } catch {
        return null;
    }
}
