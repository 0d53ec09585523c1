/**
 * Table normalization: turns a ragged grid into a rectangular, typed table.
 */
import type { Grid, Table, CellValue, ColumnType } from '@gridscan/types';

const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Most frequent row length. Ties go to the smallest length; 0 for an empty grid.
 */
export function modalWidth(grid: Grid): number {
  const counts = new Map<number, number>();
  for (const row of grid) {
    counts.set(row.length, (counts.get(row.length) ?? 0) + 1);
  }

  let width = 0;
  let bestCount = 0;
  for (const [length, count] of counts) {
    if (count > bestCount || (count === bestCount && length < width)) {
      width = length;
      bestCount = count;
    }
  }
  return width;
}

/**
 * Parse a cell as a number. Surrounding whitespace is allowed;
 * grouping separators and currency symbols are not. Integers beyond
 * `Number.MAX_SAFE_INTEGER` stay text so their digits survive.
 */
export function parseNumeric(value: string): number | null {
  const trimmed = value.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return null;

  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) return null;
  if (INTEGER_PATTERN.test(trimmed) && !Number.isSafeInteger(parsed)) return null;
  return parsed;
}

function fitRow(row: string[], width: number): string[] {
  if (row.length >= width) {
    return row.slice(0, width);
  }
  return [...row, ...new Array<string>(width - row.length).fill('')];
}

/**
 * Coerce one column in place: numeric only if every present value parses.
 */
function coerceColumn(rows: CellValue[][], column: number): ColumnType {
  const parsed: Array<number | null> = [];
  let present = 0;

  for (const row of rows) {
    const value = row[column];
    if (value === null || value === undefined) {
      parsed.push(null);
      continue;
    }

    present++;
    const numeric = typeof value === 'number' ? value : parseNumeric(value);
    if (numeric === null) return 'text';
    parsed.push(numeric);
  }

  if (present === 0) return 'text';

  rows.forEach((row, i) => {
    row[column] = parsed[i] ?? null;
  });
  return 'number';
}

/**
 * Normalize a grid into a table.
 *
 * 1. Width W = modal row length.
 * 2. Short rows are padded with empty cells, long rows truncated.
 * 3. The first row becomes the header, the rest are data rows.
 * 4. Empty data cells become null.
 * 5. Each column becomes numeric when all of its present values are numbers.
 */
export function normalizeTable(grid: Grid): Table {
  const width = modalWidth(grid);
  if (width === 0) {
    return { header: [], rows: [], columnTypes: [], width: 0 };
  }

  const fitted = grid.map(row => fitRow(row, width));
  const header = fitted[0] ?? [];

  const rows: CellValue[][] = fitted
    .slice(1)
    .map(row => row.map(cell => (cell === '' ? null : cell)));

  const columnTypes: ColumnType[] = [];
  for (let column = 0; column < width; column++) {
    columnTypes.push(coerceColumn(rows, column));
  }

  return { header, rows, columnTypes, width };
}

/**
 * Render a table back into grid form (header first, missing values as '').
 * `normalizeTable(tableToGrid(t))` reproduces `t`.
 */
export function tableToGrid(table: Table): Grid {
  if (table.width === 0) return [];
  return [
    [...table.header],
    ...table.rows.map(row => row.map(formatCell)),
  ];
}

function formatCell(cell: CellValue): string {
  if (cell === null) return '';
  return Object.is(cell, -0) ? '-0' : String(cell);
}

/**
 * Display label of a column: the header text, or a positional label when the
 * header cell is empty.
 */
export function columnLabel(table: Table, column: number): string {
  const label = table.header[column] ?? '';
  return label === '' ? `Column ${column + 1}` : label;
}

export function columnLabels(table: Table): string[] {
  return table.header.map((_, column) => columnLabel(table, column));
}
