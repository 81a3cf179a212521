import type { Workbook } from 'exceljs';
import type Decimal from 'decimal.js';
import type { ClassifiedRow } from '../pipeline/types.js';
import {
    createWorkbook,
    formatHeaderRow,
    autoFitColumns,
    formatCurrencyColumn,
    formatPercentColumn,
} from './utils.js';

/**
 * Generates results.xlsx: every classified row in input order, plus a
 * Totals sheet with counts and amount sums per category.
 */
export async function generateResultsExcel(
    rows: readonly ClassifiedRow[],
    totals: ReadonlyMap<string, Decimal>
): Promise<Workbook> {
    const workbook = createWorkbook();
    const sheet = workbook.addWorksheet('Results');

    sheet.columns = [
        { header: 'row', key: 'row' },
        { header: 'description', key: 'description' },
        { header: 'amount', key: 'amount' },
        { header: 'category', key: 'category' },
        { header: 'confidence', key: 'confidence' },
        { header: 'method', key: 'method' },
        { header: 'matched_term', key: 'matched_term' },
        { header: 'hit_count', key: 'hit_count' },
    ];

    for (const row of rows) {
        sheet.addRow({
            row: row.row,
            description: row.description,
            amount: row.amount,
            category: row.result.category,
            confidence: row.result.confidence,
            method: row.result.method,
            matched_term: row.result.matched_term ?? '',
            hit_count: row.result.hit_count,
        });
    }

    formatHeaderRow(sheet);
    formatCurrencyColumn(sheet, 'amount');
    formatPercentColumn(sheet, 'confidence');
    autoFitColumns(sheet);

    const totalsSheet = workbook.addWorksheet('Totals');
    totalsSheet.columns = [
        { header: 'category', key: 'category' },
        { header: 'count', key: 'count' },
        { header: 'total_amount', key: 'total_amount' },
    ];

    const counts = new Map<string, number>();
    for (const row of rows) {
        counts.set(row.result.category, (counts.get(row.result.category) ?? 0) + 1);
    }
    for (const [category, total] of totals) {
        totalsSheet.addRow({
            category,
            count: counts.get(category) ?? 0,
            total_amount: total.toNumber(),
        });
    }

    formatHeaderRow(totalsSheet);
    formatCurrencyColumn(totalsSheet, 'total_amount');
    autoFitColumns(totalsSheet);

    return workbook;
}
