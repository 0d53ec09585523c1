/**
 * Spreadsheet export using SheetJS (xlsx): one worksheet, header row of
 * column labels, column widths sized to their longest rendered value.
 */

import * as XLSX from 'xlsx';
import { writeFile } from 'fs/promises';
import type { Table, CellValue } from '@gridscan/types';
import { EXPORT_COLUMN_WIDTH } from '@gridscan/types';
import { columnLabels } from '@gridscan/grid-extract';

export interface XlsxExportOptions {
  /** Worksheet name (default: 'Table') */
  sheetName?: string;
}

export const DEFAULT_SHEET_NAME = 'Table';

function renderCell(value: CellValue | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Width of each column in characters: the longest rendered value
 * (header label included) plus a margin, capped.
 */
export function computeColumnWidths(table: Table): number[] {
  const labels = columnLabels(table);

  return labels.map((label, column) => {
    let maxLength = label.length;
    for (const row of table.rows) {
      maxLength = Math.max(maxLength, renderCell(row[column]).length);
    }
    return Math.min(maxLength + EXPORT_COLUMN_WIDTH.MARGIN, EXPORT_COLUMN_WIDTH.MAX);
  });
}

/**
 * Missing values are left out of the sheet, so they read back as empty cells.
 */
export function buildWorkbook(table: Table, options: XlsxExportOptions = {}): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  const data: CellValue[][] = table.width === 0 ? [] : [columnLabels(table), ...table.rows];
  const worksheet = XLSX.utils.aoa_to_sheet(data);
  if (table.width > 0) {
    worksheet['!cols'] = computeColumnWidths(table).map(wch => ({ wch }));
  }

  XLSX.utils.book_append_sheet(workbook, worksheet, options.sheetName ?? DEFAULT_SHEET_NAME);
  return workbook;
}

export function toXlsxBuffer(table: Table, options: XlsxExportOptions = {}): Buffer {
  const buffer: Buffer = XLSX.write(buildWorkbook(table, options), { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

/**
 * Write the table to an .xlsx file.
 */
export async function saveXlsx(
  table: Table,
  filePath: string,
  options: XlsxExportOptions = {}
): Promise<void> {
  await writeFile(filePath, toXlsxBuffer(table, options));
}
