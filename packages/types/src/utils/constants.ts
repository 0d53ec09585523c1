export const GRIDSCAN_VERSION = '0.3.0';

export const RESULT_SCHEMA_VERSION = '1.0.0';

/** Row gap assumed when there are too few tokens to measure one */
export const DEFAULT_ROW_GAP = 30;

export const ROW_THRESHOLD = {
  FACTOR: 1.3,
  MIN: 15,
  MAX: 50,
} as const;

export const COLUMN_THRESHOLD = {
  FACTOR: 2,
  MIN: 20,
} as const;

export const ROUNDING = {
  CONFIDENCE_DECIMALS: 4,
  ELAPSED_DECIMALS: 2,
} as const;

export const EXPORT_COLUMN_WIDTH = {
  MARGIN: 2,
  MAX: 50,
} as const;

export const PREVIEW_ROWS = 5;

export const ERROR_MESSAGES = {
  NO_TOKENS_PRODUCED: 'No text detected',
  NO_TABLE_STRUCTURE_DETECTED: 'Could not detect table structure',
} as const;
