/**
 * Grid alignment: folds each row's cells onto the detected column anchors.
 */
import type { Row, ColumnAnchor, Grid } from '@gridscan/types';
import { rowTexts } from './rows.js';

/**
 * Realignment applies only when there are at least two anchors and fewer
 * anchors than cells in the first row.
 */
export function shouldRealign(rows: readonly Row[], anchors: readonly ColumnAnchor[]): boolean {
  const firstRow = rows[0];
  if (firstRow === undefined) return false;
  return anchors.length > 1 && anchors.length < firstRow.cells.length;
}

/**
 * Index of the anchor closest to x. The leftmost anchor wins a tie.
 * Returns -1 when there are no anchors.
 */
export function nearestAnchor(x: number, anchors: readonly ColumnAnchor[]): number {
  let best = -1;
  let bestDistance = Infinity;

  for (let i = 0; i < anchors.length; i++) {
    const anchor = anchors[i];
    if (anchor === undefined) continue;

    const distance = Math.abs(x - anchor);
    if (distance < bestDistance) {
      best = i;
      bestDistance = distance;
    }
  }

  return best;
}

/**
 * Build the grid for a set of rows.
 *
 * When realignment applies, every row gets exactly one slot per anchor;
 * cells sharing a slot are joined with a space in row order and unused slots
 * stay empty. Otherwise the rows' own cell texts are returned unchanged.
 */
export function alignGrid(rows: readonly Row[], anchors: readonly ColumnAnchor[]): Grid {
  if (!shouldRealign(rows, anchors)) {
    return rowTexts(rows);
  }

  return rows.map(row => {
    const aligned: string[] = anchors.map(() => '');

    for (const cell of row.cells) {
      const slot = nearestAnchor(cell.x, anchors);
      const current = aligned[slot];
      if (current === undefined) continue;

      aligned[slot] = current === '' ? cell.text : `${current} ${cell.text}`;
    }

    return aligned;
  });
}
