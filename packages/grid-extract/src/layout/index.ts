/**
 * Layout stages of table reconstruction: rows, column anchors, alignment.
 */

export { clusterRows, computeRowThreshold, rowTexts, countCells } from './rows.js';
export type { RowClusterOptions } from './rows.js';

export { clusterColumns, computeColumnThreshold } from './columns.js';
export type { ColumnClusterOptions } from './columns.js';

export { alignGrid, shouldRealign, nearestAnchor } from './align.js';
