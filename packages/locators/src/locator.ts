import type { Token, ImageSource } from '@gridscan/types';

/**
 * Adapter around one recognition backend.
 *
 * Implementations must return tokens in top-to-bottom reading order, with
 * trimmed non-empty text, integer pixel positions and confidence in [0, 1],
 * and must drop tokens below their own minimum confidence.
 */
export interface TokenLocator {
  readonly name: string;
  locate(image: ImageSource): Promise<Token[]>;
}

/** Backends report words this uncertain or worse as noise */
export const DEFAULT_MIN_CONFIDENCE = 0.2;

/**
 * Build a token from raw backend values, or null if it should be dropped.
 */
export function toToken(
  rawText: string,
  y: number,
  x: number,
  confidence: number,
  minConfidence: number
): Token | null {
  const text = rawText.trim();
  if (text === '' || confidence < minConfidence) return null;
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;

  return {
    text,
    y: Math.trunc(y),
    x: Math.trunc(x),
    confidence: Math.min(1, Math.max(0, confidence)),
  };
}
