import type { Table, CellValue } from '@gridscan/types';
import { PREVIEW_ROWS } from '@gridscan/types';
import { columnLabels } from '@gridscan/grid-extract';

function render(value: CellValue | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Fixed-width text rendering of the header and the first rows.
 * Numeric columns are right-aligned.
 */
export function renderPreview(table: Table, maxRows: number = PREVIEW_ROWS): string {
  if (table.width === 0 || table.rows.length === 0) {
    return 'No data';
  }

  const labels = columnLabels(table);
  const rows = table.rows.slice(0, maxRows).map(row => row.map(render));

  const widths = labels.map((label, column) =>
    Math.max(label.length, ...rows.map(row => (row[column] ?? '').length))
  );

  const formatLine = (cells: string[]): string =>
    cells
      .map((cell, column) => {
        const width = widths[column] ?? cell.length;
        return table.columnTypes[column] === 'number' ? cell.padStart(width) : cell.padEnd(width);
      })
      .join('  ')
      .trimEnd();

  const lines = [formatLine(labels), ...rows.map(formatLine)];
  if (table.rows.length > maxRows) {
    lines.push(`... ${table.rows.length - maxRows} more row(s)`);
  }
  return lines.join('\n');
}
