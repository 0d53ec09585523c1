export type {
  Token,
  RowCell,
  Row,
  ColumnAnchor,
  Grid,
  CellValue,
  ColumnType,
  Table,
  ExtractionErrorKind,
  ExtractionResult,
  ImageSource,
  LocatedTokens,
  TokenSource,
} from './table.js';
