/**
 * Data model shared by the locators, the reconstruction core and the exporters.
 */

/**
 * One recognized word as produced by a locator.
 * Positions are pixel-scale integers; `confidence` lies in [0, 1].
 */
export interface Token {
  readonly text: string;
  readonly y: number;
  readonly x: number;
  readonly confidence: number;
}

/**
 * A token placed in a row. `tokenIndex` points back into the locator output
 * so later stages match cells by identity rather than by text.
 */
export interface RowCell {
  text: string;
  x: number;
  confidence: number;
  tokenIndex: number;
}

/**
 * Tokens sharing one row band, sorted left to right.
 */
export interface Row {
  cells: RowCell[];
}

/** Horizontal center of one inferred column. */
export type ColumnAnchor = number;

/** Row-major cell text before normalization; rows may differ in length. */
export type Grid = string[][];

/** `null` marks a missing value. */
export type CellValue = string | number | null;

export type ColumnType = 'number' | 'text';

/**
 * Rectangular table: every data row has exactly `width` cells.
 */
export interface Table {
  header: string[];
  rows: CellValue[][];
  columnTypes: ColumnType[];
  width: number;
}

/**
 * `LOCATOR_FAILURE`: the token source threw (every backend failed).
 * `RECONSTRUCTION_FAILURE`: clustering, normalization or a stage hook threw.
 */
export type ExtractionErrorKind =
  | 'NO_TOKENS_PRODUCED'
  | 'NO_TABLE_STRUCTURE_DETECTED'
  | 'LOCATOR_FAILURE'
  | 'RECONSTRUCTION_FAILURE';

/**
 * Outcome of one extraction call. Failures carry zeroed statistics.
 */
export interface ExtractionResult {
  success: boolean;
  error?: string;
  errorKind?: ExtractionErrorKind;
  rowsExtracted: number;
  columnsDetected: number;
  table?: Table;
  /** Mean token confidence, rounded to 4 decimals */
  confidence: number;
  /** Wall-clock seconds, rounded to 2 decimals */
  elapsedTime: number;
  backendName: string;
}

/**
 * Raw image bytes handed to a locator.
 */
export interface ImageSource {
  data: Uint8Array;
  mimeType: string;
  fileName?: string;
}

/**
 * Tokens together with the name of the backend that produced them.
 */
export interface LocatedTokens {
  tokens: Token[];
  backendName: string;
}

/**
 * Anything that can turn an image into located tokens: a single locator
 * adapter or an ordered chain of them.
 */
export interface TokenSource {
  readonly name: string;
  locate(image: ImageSource): Promise<LocatedTokens>;
}
