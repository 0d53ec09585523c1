/**
 * Gemini vision locator. The model is prompted to list every word it can
 * read as `TEXT|Y|X|CONFIDENCE`, with Y and X on a coarse row/column scale.
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { Token, ImageSource } from '@gridscan/types';
import { DEFAULT_MIN_CONFIDENCE, toToken, type TokenLocator } from './locator.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

/** Pixels per unit of the model's coarse row/column scale */
export const GEMINI_POSITION_SCALE = 20;

export const GEMINI_TOKEN_PROMPT = `Analyze this document image and extract ALL visible text.
For each word or number you find:
1. Extract the exact text content
2. Estimate its Y position (row number, starting from 1 at top)
3. Estimate its X position (column number, starting from 1 at left)
4. Rate your confidence (0-100%)

Format each entry as: TEXT|Y|X|CONFIDENCE
Example: "Book|5|10|85" means "Book" at row 5, column 10, 85% confident

List entries from top to bottom, left to right. Extract everything you can read, even if confidence is low.`;

export interface GeminiLocatorOptions {
  apiKey: string;
  model?: string;
  minConfidence?: number;
  /** Prebuilt model, mainly for tests */
  generativeModel?: Pick<GenerativeModel, 'generateContent'>;
}

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Parse `TEXT|Y|X|CONFIDENCE` lines. Lines without a `|`, with fewer than
 * four fields, or with unparseable numbers are skipped. Extra fields after
 * the fourth are ignored.
 */
export function parseGeminiTokens(
  responseText: string,
  minConfidence: number = DEFAULT_MIN_CONFIDENCE
): Token[] {
  const tokens: Token[] = [];

  for (const rawLine of responseText.trim().split('\n')) {
    const line = rawLine.trim();
    if (!line.includes('|')) continue;

    const parts = line.split('|').map(part => part.trim());
    if (parts.length < 4) continue;

    const [text = '', yField = '', xField = '', confidenceField = ''] = parts;
    if (!INTEGER_PATTERN.test(yField) || !INTEGER_PATTERN.test(xField)) continue;

    const confidenceText = confidenceField.replace('%', '').trim();
    const confidencePercent = Number(confidenceText);
    if (confidenceText === '' || Number.isNaN(confidencePercent)) continue;

    const token = toToken(
      text,
      Number.parseInt(yField, 10) * GEMINI_POSITION_SCALE,
      Number.parseInt(xField, 10) * GEMINI_POSITION_SCALE,
      confidencePercent / 100,
      minConfidence
    );
    if (token !== null) {
      tokens.push(token);
    }
  }

  return tokens;
}

export class GeminiLocator implements TokenLocator {
  readonly name = 'GEMINI_VISION';
  private readonly model: Pick<GenerativeModel, 'generateContent'>;
  private readonly minConfidence: number;

  constructor(options: GeminiLocatorOptions) {
    this.model = options.generativeModel ?? new GoogleGenerativeAI(options.apiKey).getGenerativeModel({
      model: options.model ?? DEFAULT_GEMINI_MODEL,
      generationConfig: {
        temperature: 0,
      },
    });
    this.minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  }

  async locate(image: ImageSource): Promise<Token[]> {
    const result = await this.model.generateContent([
      GEMINI_TOKEN_PROMPT,
      {
        inlineData: {
          data: Buffer.from(image.data).toString('base64'),
          mimeType: image.mimeType,
        },
      },
    ]);

    return parseGeminiTokens(result.response.text(), this.minConfidence);
  }
}
