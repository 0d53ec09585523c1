/**
 * CSV Exporter Module
 *
 * Converts a reconstructed table to CSV for spreadsheet import.
 */

import type { Table, CellValue } from '@gridscan/types';
import { columnLabels } from '@gridscan/grid-extract';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Replace empty header cells with "Column N" labels (default: true) */
  labelEmptyHeaders?: boolean;
}

const DEFAULT_OPTIONS: Required<CsvExportOptions> = {
  includeHeader: true,
  delimiter: ',',
  labelEmptyHeaders: true,
};

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
export function escapeCsvValue(value: CellValue | undefined, delimiter: string): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);

  const needsQuoting = str.includes(delimiter) ||
                       str.includes('"') ||
                       str.includes('\n') ||
                       str.includes('\r');

  if (needsQuoting) {
    // Escape quotes by doubling them and wrap in quotes
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function rowToCsvLine(row: readonly CellValue[], delimiter: string): string {
  return row.map(value => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Export a table to CSV. Missing values become empty fields.
 */
export function exportCsv(table: Table, options: CsvExportOptions = {}): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const lines: string[] = [];

  if (opts.includeHeader && table.width > 0) {
    const header = opts.labelEmptyHeaders ? columnLabels(table) : table.header;
    lines.push(rowToCsvLine(header, opts.delimiter));
  }

  for (const row of table.rows) {
    lines.push(rowToCsvLine(row, opts.delimiter));
  }

  return lines.join('\n');
}
