export {
  GRIDSCAN_VERSION,
  RESULT_SCHEMA_VERSION,
  DEFAULT_ROW_GAP,
  ROW_THRESHOLD,
  COLUMN_THRESHOLD,
  ROUNDING,
  EXPORT_COLUMN_WIDTH,
  PREVIEW_ROWS,
  ERROR_MESSAGES,
} from './constants.js';
export { median, consecutiveGaps, clamp, roundTo, mean } from './stats.js';
