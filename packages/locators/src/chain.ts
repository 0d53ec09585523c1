/**
 * Ordered fallback across locators.
 */
import type { ImageSource, LocatedTokens, TokenSource } from '@gridscan/types';
import { BackendUnavailableError, errorMessage } from '@gridscan/types';
import type { TokenLocator } from './locator.js';
import { withRetry, type RetryOptions } from './retry.js';

export interface LocatorFailure {
  locator: string;
  error: Error;
}

export interface LocatorChainOptions {
  /** Retry settings applied to each locator call */
  retry?: RetryOptions;
  /** Called when a locator throws, before the next one is tried */
  onFailure?: (failure: LocatorFailure) => void;
  /** Called when a locator answers with no tokens */
  onEmpty?: (locator: string) => void;
}

/**
 * Tries locators in the order given until one returns tokens.
 *
 * - The first non-empty answer wins and is reported under that locator's name.
 * - An empty answer or an error moves on to the next locator.
 * - If every locator answered (some possibly empty) without tokens, the result
 *   is empty and carries the first locator's name.
 * - If every locator threw, the chain throws with each failure listed.
 */
export class LocatorChain implements TokenSource {
  private readonly locators: readonly TokenLocator[];
  private readonly options: LocatorChainOptions;

  constructor(locators: readonly TokenLocator[], options: LocatorChainOptions = {}) {
    if (locators.length === 0) {
      throw new BackendUnavailableError('No OCR backend available');
    }
    this.locators = locators;
    this.options = options;
  }

  /** Name of the primary locator */
  get name(): string {
    return this.locators[0]?.name ?? 'NONE';
  }

  get locatorNames(): string[] {
    return this.locators.map(locator => locator.name);
  }

  async locate(image: ImageSource): Promise<LocatedTokens> {
    const failures: LocatorFailure[] = [];

    for (const locator of this.locators) {
      try {
        const tokens = await withRetry(() => locator.locate(image), this.options.retry);
        if (tokens.length > 0) {
          return { tokens, backendName: locator.name };
        }
        this.options.onEmpty?.(locator.name);
      } catch (error) {
        const failure: LocatorFailure = {
          locator: locator.name,
          error: error instanceof Error ? error : new Error(errorMessage(error)),
        };
        failures.push(failure);
        this.options.onFailure?.(failure);
      }
    }

    if (failures.length === this.locators.length) {
      const details = failures.map(f => `${f.locator}: ${f.error.message}`).join('; ');
      throw new Error(`All OCR backends failed (${details})`);
    }

    return { tokens: [], backendName: this.name };
  }
}
