import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { parseTransactionSheet, parseAmount } from '../../src/parser/sheet.js';

describe('parseTransactionSheet', () => {
    const sourceFile = 'october.csv';

    function createCsv(rows: Record<string, unknown>[]): ArrayBuffer {
        const wb = XLSX.utils.book_new();
        const ws = XLSX.utils.json_to_sheet(rows);
        XLSX.utils.book_append_sheet(wb, ws, 'Sheet1');
        return XLSX.write(wb, { type: 'array', bookType: 'csv' });
    }

    function createXlsx(rows: Record<string, unknown>[]): ArrayBuffer {
        const wb = XLSX.utils.book_new();
        XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(rows), 'Transactions');
        return XLSX.write(wb, { type: 'array', bookType: 'xlsx' });
    }

    it('parses descriptions and amounts', () => {
        const data = createCsv([
            { Description: 'Starbucks Coffee', Amount: '4.85' },
            { Description: 'Shell Gas Station', Amount: '-52.30' },
        ]);

        const result = parseTransactionSheet(data, sourceFile);

        expect(result.rows).toEqual([
            { row: 2, description: 'Starbucks Coffee', amount: 4.85 },
            { row: 3, description: 'Shell Gas Station', amount: -52.3 },
        ]);
        expect(result.warnings).toEqual([]);
        expect(result.skippedRows).toBe(0);
    });

    it('reads xlsx workbooks', () => {
        const data = createXlsx([{ Description: 'Uber Trip', Amount: 18.2 }]);
        const result = parseTransactionSheet(data, 'october.xlsx');
        expect(result.rows).toEqual([{ row: 2, description: 'Uber Trip', amount: 18.2 }]);
    });

    it('matches column names case-insensitively and accepts Text', () => {
        const data = createCsv([{ TEXT: 'Netflix', AMOUNT: '15.99' }]);
        const result = parseTransactionSheet(data, sourceFile);
        expect(result.rows[0].description).toBe('Netflix');
        expect(result.rows[0].amount).toBe(15.99);
    });

    it('treats the amount column as optional', () => {
        const data = createCsv([{ Description: 'Monthly rent' }]);
        const result = parseTransactionSheet(data, sourceFile);
        expect(result.rows).toEqual([{ row: 2, description: 'Monthly rent', amount: null }]);
    });

    it('handles amounts with commas', () => {
        const data = createCsv([{ Description: 'Laptop', Amount: '1,234.56' }]);
        const result = parseTransactionSheet(data, sourceFile);
        expect(result.rows[0].amount).toBe(1234.56);
    });

    it('keeps rows with an invalid amount and warns', () => {
        const data = createCsv([
            { Description: 'Coffee', Amount: 'pending' },
        ]);
        const result = parseTransactionSheet(data, sourceFile);
        expect(result.rows).toEqual([{ row: 2, description: 'Coffee', amount: null }]);
        expect(result.warnings).toEqual(['october.csv line 2: invalid amount "pending", kept as empty']);
    });

    it('skips rows without a description', () => {
        const data = createXlsx([
            { Description: 'Coffee', Amount: 3 },
            { Amount: 5 },
        ]);
        const result = parseTransactionSheet(data, 'october.xlsx');
        expect(result.rows).toHaveLength(1);
        expect(result.skippedRows).toBe(1);
        expect(result.warnings).toEqual(['october.xlsx: skipped 1 rows with no description']);
    });

    it('returns empty result for empty data', () => {
        const data = createCsv([]);
        const result = parseTransactionSheet(data, sourceFile);
        expect(result.rows).toHaveLength(0);
    });

    it('throws for a missing description column', () => {
        const data = createCsv([{ Memo: 'Coffee', Amount: '1.00' }]);
        expect(() => parseTransactionSheet(data, sourceFile)).toThrow(/Missing required column: Description/);
    });
});

describe('parseAmount', () => {
    it.each([
        [12.5, 12.5],
        ['12.50', 12.5],
        ['-7', -7],
        ['$1,234.50', 1234.5],
        ['(12.00)', -12],
        ['€ 9.99', 9.99],
    ])('parses %j', (input, expected) => {
        expect(parseAmount(input)).toBe(expected);
    });

    it.each([[''], ['  '], ['abc'], [null], [undefined], [Number.NaN], ['Infinity']])(
        'returns null for %j',
        (input) => {
            expect(parseAmount(input)).toBeNull();
        }
    );
});
