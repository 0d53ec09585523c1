// Layout stages (rows, column anchors, alignment)
export * from './layout/index.js';

// Normalization
export {
  normalizeTable,
  modalWidth,
  parseNumeric,
  tableToGrid,
  columnLabel,
  columnLabels,
} from './normalize.js';

// Orchestration
export { reconstructTable, buildTable, failureResult } from './table-builder.js';
export type {
  Reconstruction,
  ReconstructionStage,
  ReconstructionOptions,
  BuildTableOptions,
} from './table-builder.js';

export { TableExtractor } from './extractor.js';
export type { TableExtractorOptions, ExtractionStage } from './extractor.js';
