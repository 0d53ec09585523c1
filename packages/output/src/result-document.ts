/**
 * JSON result document: the extraction result plus source and tool metadata,
 * in the shape described by the bundled JSON Schema.
 */

import type { ExtractionResult, ExtractionErrorKind, CellValue, ColumnType } from '@gridscan/types';
import { GRIDSCAN_VERSION, RESULT_SCHEMA_VERSION } from '@gridscan/types';

export interface SerializedTable {
  header: string[];
  columnTypes: ColumnType[];
  rows: CellValue[][];
}

export interface ResultDocument {
  schemaVersion: typeof RESULT_SCHEMA_VERSION;
  source: {
    fileName: string;
    backendName: string;
  };
  result: {
    success: boolean;
    error?: string;
    errorKind?: ExtractionErrorKind;
    rowsExtracted: number;
    columnsDetected: number;
    confidence: number;
    elapsedTime: number;
    table: SerializedTable | null;
  };
  metadata: {
    tool: { name: string; version: string };
    generatedAt: string;
    preview?: string;
  };
}

export interface ResultDocumentOptions {
  /** Timestamp for metadata.generatedAt (default: now) */
  generatedAt?: Date;
  /** Text preview to embed in metadata */
  preview?: string;
}

export function toResultDocument(
  result: ExtractionResult,
  fileName: string,
  options: ResultDocumentOptions = {}
): ResultDocument {
  const table = result.table;

  const document: ResultDocument = {
    schemaVersion: RESULT_SCHEMA_VERSION,
    source: {
      fileName,
      backendName: result.backendName,
    },
    result: {
      success: result.success,
      rowsExtracted: result.rowsExtracted,
      columnsDetected: result.columnsDetected,
      confidence: result.confidence,
      elapsedTime: result.elapsedTime,
      table: table === undefined
        ? null
        : { header: table.header, columnTypes: table.columnTypes, rows: table.rows },
    },
    metadata: {
      tool: { name: 'gridscan', version: GRIDSCAN_VERSION },
      generatedAt: (options.generatedAt ?? new Date()).toISOString(),
    },
  };

  if (result.error !== undefined) {
    document.result.error = result.error;
  }
  if (result.errorKind !== undefined) {
    document.result.errorKind = result.errorKind;
  }
  if (options.preview !== undefined) {
    document.metadata.preview = options.preview;
  }

  return document;
}
