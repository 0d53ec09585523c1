/**
 * Table reconstruction pipeline and its result-producing orchestration.
 */
import type {
  Token,
  Row,
  ColumnAnchor,
  Grid,
  Table,
  ExtractionResult,
  ExtractionErrorKind,
} from '@gridscan/types';
import { ERROR_MESSAGES, ROUNDING, mean, roundTo, errorMessage } from '@gridscan/types';
import { clusterRows, clusterColumns, alignGrid } from './layout/index.js';
import { normalizeTable } from './normalize.js';

export type ReconstructionStage = 'rows' | 'columns' | 'aligned' | 'normalized';

export interface ReconstructionOptions {
  /** Stable-sort tokens by y before row clustering */
  presortByY?: boolean;
  /** Called after each stage with the number of items it produced */
  onStage?: (stage: ReconstructionStage, count: number) => void;
}

export interface BuildTableOptions extends ReconstructionOptions {
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
  /** Start of the measured call, when it began before buildTable (e.g. at the locator call) */
  startedAt?: number;
}

export interface Reconstruction {
  rows: Row[];
  anchors: ColumnAnchor[];
  grid: Grid;
  table: Table;
}

/**
 * Run rows → anchors → aligned grid → table. Pure and synchronous.
 */
export function reconstructTable(
  tokens: readonly Token[],
  options: ReconstructionOptions = {}
): Reconstruction {
  const rows = clusterRows(tokens, { presortByY: options.presortByY });
  options.onStage?.('rows', rows.length);

  const anchors = clusterColumns(tokens);
  options.onStage?.('columns', anchors.length);

  const grid = alignGrid(rows, anchors);
  options.onStage?.('aligned', grid.length);

  const table = normalizeTable(grid);
  options.onStage?.('normalized', table.rows.length);

  return { rows, anchors, grid, table };
}

function elapsedSeconds(startedAt: number, now: () => number): number {
  return roundTo((now() - startedAt) / 1000, ROUNDING.ELAPSED_DECIMALS);
}

/**
 * Failure result with zeroed statistics.
 */
export function failureResult(
  kind: ExtractionErrorKind,
  error: string,
  backendName: string,
  elapsedTime: number
): ExtractionResult {
  return {
    success: false,
    error,
    errorKind: kind,
    rowsExtracted: 0,
    columnsDetected: 0,
    confidence: 0,
    elapsedTime,
    backendName,
  };
}

/**
 * Reconstruct a table from located tokens and summarize the outcome.
 * Never throws: every failure comes back as `success: false`.
 */
export function buildTable(
  tokens: readonly Token[],
  backendName: string,
  options: BuildTableOptions = {}
): ExtractionResult {
  const now = options.now ?? Date.now;
  const startedAt = options.startedAt ?? now();

  try {
    if (tokens.length === 0) {
      return failureResult(
        'NO_TOKENS_PRODUCED',
        ERROR_MESSAGES.NO_TOKENS_PRODUCED,
        backendName,
        elapsedSeconds(startedAt, now)
      );
    }

    const { grid, table } = reconstructTable(tokens, options);

    if (grid.length === 0) {
      return failureResult(
        'NO_TABLE_STRUCTURE_DETECTED',
        ERROR_MESSAGES.NO_TABLE_STRUCTURE_DETECTED,
        backendName,
        elapsedSeconds(startedAt, now)
      );
    }

    const confidence = mean(tokens.map(token => token.confidence));

    return {
      success: true,
      rowsExtracted: table.rows.length,
      columnsDetected: table.width,
      table,
      confidence: roundTo(confidence, ROUNDING.CONFIDENCE_DECIMALS),
      elapsedTime: elapsedSeconds(startedAt, now),
      backendName,
    };
  } catch (error) {
    return failureResult(
      'RECONSTRUCTION_FAILURE',
      errorMessage(error),
      backendName,
      elapsedSeconds(startedAt, now)
    );
  }
}
