import type { Token, ImageSource } from '@gridscan/types';
import type { TokenLocator } from './locator.js';

/**
 * Locator that always answers with a fixed token list, such as tokens read
 * from a file produced by an earlier run.
 */
export class StaticLocator implements TokenLocator {
  readonly name: string;
  private readonly tokens: readonly Token[];

  constructor(tokens: readonly Token[], name: string = 'STATIC') {
    this.tokens = tokens;
    this.name = name;
  }

  locate(_image: ImageSource): Promise<Token[]> {
    return Promise.resolve([...this.tokens]);
  }
}
