/**
 * Row clustering for OCR tokens.
 * Groups tokens into rows using an adaptive vertical-gap threshold.
 */
import type { Token, Row, RowCell } from '@gridscan/types';
import { DEFAULT_ROW_GAP, ROW_THRESHOLD, median, consecutiveGaps, clamp } from '@gridscan/types';

export interface RowClusterOptions {
  /** Fixed row threshold in pixels; computed from the token gaps when omitted */
  threshold?: number;
  /**
   * Stable-sort tokens by y before clustering. Locators are expected to
   * deliver reading order already; this is for those that cannot.
   */
  presortByY?: boolean;
}

/**
 * Vertical distance at which a token starts a new row:
 * 1.3 × the median gap between sorted y values, clamped to [15, 50].
 */
export function computeRowThreshold(tokens: readonly Token[]): number {
  const ys = tokens.map(token => token.y).sort((a, b) => a - b);
  const medianGap = median(consecutiveGaps(ys)) ?? DEFAULT_ROW_GAP;
  return clamp(medianGap * ROW_THRESHOLD.FACTOR, ROW_THRESHOLD.MIN, ROW_THRESHOLD.MAX);
}

/**
 * Group tokens into rows.
 *
 * Tokens are walked in the order given. Each one is compared with the token
 * immediately before it (not with the row's first token), so a single large
 * gap can split what looks like one printed line.
 *
 * @returns Rows top to bottom, each sorted left to right by x
 */
export function clusterRows(tokens: readonly Token[], options: RowClusterOptions = {}): Row[] {
  if (tokens.length === 0) return [];

  const threshold = options.threshold ?? computeRowThreshold(tokens);

  const indexed = tokens.map((token, tokenIndex) => ({ token, tokenIndex }));
  const ordered = options.presortByY === true
    ? [...indexed].sort((a, b) => a.token.y - b.token.y)
    : indexed;

  const rows: Row[] = [];
  let currentRow: RowCell[] = [];
  let previousY: number | undefined;

  for (const { token, tokenIndex } of ordered) {
    const cell: RowCell = {
      text: token.text,
      x: token.x,
      confidence: token.confidence,
      tokenIndex,
    };

    if (previousY === undefined || Math.abs(token.y - previousY) < threshold) {
      currentRow.push(cell);
    } else {
      if (currentRow.length > 0) {
        rows.push(createRow(currentRow));
      }
      currentRow = [cell];
    }
    previousY = token.y;
  }

  // Don't forget the last row
  if (currentRow.length > 0) {
    rows.push(createRow(currentRow));
  }

  return rows;
}

function createRow(cells: RowCell[]): Row {
  // Array.prototype.sort is stable, so equal x keeps encounter order
  return { cells: [...cells].sort((a, b) => a.x - b.x) };
}

/**
 * Cell texts of each row, left to right.
 */
export function rowTexts(rows: readonly Row[]): string[][] {
  return rows.map(row => row.cells.map(cell => cell.text));
}

/**
 * Total number of cells across rows.
 */
export function countCells(rows: readonly Row[]): number {
  return rows.reduce((sum, row) => sum + row.cells.length, 0);
}
