/**
 * Output module - renders reconstructed tables to files and documents.
 */

export {
  buildWorkbook,
  toXlsxBuffer,
  saveXlsx,
  computeColumnWidths,
  DEFAULT_SHEET_NAME,
  type XlsxExportOptions,
} from './xlsx-exporter.js';

export {
  exportCsv,
  escapeCsvValue,
  type CsvExportOptions,
} from './csv-exporter.js';

export {
  toResultDocument,
  type ResultDocument,
  type ResultDocumentOptions,
  type SerializedTable,
} from './result-document.js';

export { renderPreview } from './preview.js';
