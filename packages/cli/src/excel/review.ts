import type { Workbook } from 'exceljs';
import type { ClassifiedRow } from '../pipeline/types.js';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatCurrencyColumn } from './utils.js';

/**
 * Rows no rule matched: the catalog fallback and empty descriptions.
 * Lowest confidence first, then input order.
 */
export function selectReviewRows(rows: readonly ClassifiedRow[]): ClassifiedRow[] {
    return rows
        .filter((r) => r.result.method === 'default_other' || r.result.method === 'empty_normalized')
        .sort((a, b) => a.result.confidence - b.result.confidence || a.row - b.row);
}

/**
 * Generates review.xlsx with an empty your_category column to fill in.
 */
export async function generateReviewExcel(rows: readonly ClassifiedRow[]): Promise<Workbook> {
    const workbook = createWorkbook();
    const sheet = workbook.addWorksheet('Review');

    sheet.columns = [
        { header: 'row', key: 'row' },
        { header: 'description', key: 'description' },
        { header: 'amount', key: 'amount' },
        { header: 'suggested_category', key: 'suggested_category' },
        { header: 'confidence', key: 'confidence' },
        { header: 'review_reason', key: 'review_reason' },
        { header: 'your_category', key: 'your_category' },
    ];

    for (const row of selectReviewRows(rows)) {
        sheet.addRow({
            row: row.row,
            description: row.description,
            amount: row.amount,
            suggested_category: row.result.category,
            confidence: row.result.confidence,
            review_reason:
                row.result.method === 'empty_normalized' ? 'Description has no usable words' : 'No rule matched',
            your_category: '',
        });
    }

    formatHeaderRow(sheet);
    formatCurrencyColumn(sheet, 'amount');
    autoFitColumns(sheet);

    // Freeze row and description columns
    sheet.views = [{ state: 'frozen', xSplit: 2, ySplit: 1 }];

    return workbook;
}
