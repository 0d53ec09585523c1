/**
 * Image-to-table extraction: asks a token source for tokens, then runs
 * the reconstruction pipeline on them.
 */
import type { ExtractionResult, ImageSource, LocatedTokens, TokenSource } from '@gridscan/types';
import { ROUNDING, roundTo, errorMessage } from '@gridscan/types';
import { buildTable, failureResult, type ReconstructionStage } from './table-builder.js';

export type ExtractionStage = 'located' | ReconstructionStage;

export interface TableExtractorOptions {
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
  /** Stable-sort tokens by y before row clustering */
  presortByY?: boolean;
  /** Progress hook, called once per stage with the stage's item count */
  onStage?: (stage: ExtractionStage, count: number) => void;
}

export class TableExtractor {
  private readonly source: TokenSource;
  private readonly options: TableExtractorOptions;

  constructor(source: TokenSource, options: TableExtractorOptions = {}) {
    this.source = source;
    this.options = options;
  }

  get backendName(): string {
    return this.source.name;
  }

  /**
   * Extract a table from one image. Errors raised by the token source or a
   * stage hook come back as a failed result.
   */
  async extract(image: ImageSource): Promise<ExtractionResult> {
    const now = this.options.now ?? Date.now;
    const startedAt = now();
    const elapsed = (): number => roundTo((now() - startedAt) / 1000, ROUNDING.ELAPSED_DECIMALS);

    let located: LocatedTokens;
    try {
      located = await this.source.locate(image);
    } catch (error) {
      return failureResult('LOCATOR_FAILURE', errorMessage(error), this.source.name, elapsed());
    }

    try {
      this.options.onStage?.('located', located.tokens.length);
    } catch (error) {
      return failureResult('RECONSTRUCTION_FAILURE', errorMessage(error), located.backendName, elapsed());
    }

    return buildTable(located.tokens, located.backendName, {
      now,
      startedAt,
      presortByY: this.options.presortByY,
      onStage: this.options.onStage,
    });
  }
}
