/**
 * Google Cloud Vision locator (document text detection).
 */

import { ImageAnnotatorClient } from '@google-cloud/vision';
import type { Token, ImageSource } from '@gridscan/types';
import { DEFAULT_MIN_CONFIDENCE, toToken, type TokenLocator } from './locator.js';

// Structural view of the parts of a Vision response this module reads.
// Generated protobuf interfaces mark every field optional and nullable.

interface VisionVertex {
  x?: number | null;
  y?: number | null;
}

interface VisionSymbol {
  text?: string | null;
  confidence?: number | null;
}

interface VisionWord {
  symbols?: VisionSymbol[] | null;
  boundingBox?: { vertices?: VisionVertex[] | null } | null;
}

interface VisionParagraph {
  words?: VisionWord[] | null;
}

interface VisionBlock {
  paragraphs?: VisionParagraph[] | null;
}

interface VisionPage {
  blocks?: VisionBlock[] | null;
}

export interface VisionTextAnnotation {
  pages?: VisionPage[] | null;
}

export interface VisionAnnotateRequest {
  requests: Array<{
    image: { content: Uint8Array };
    features: Array<{ type: 'DOCUMENT_TEXT_DETECTION' }>;
  }>;
}

export interface VisionBatchResponse {
  responses?: Array<{
    fullTextAnnotation?: VisionTextAnnotation | null;
    error?: { message?: string | null } | null;
  }> | null;
}

/** The one client call this locator makes; ImageAnnotatorClient satisfies it */
export interface VisionClient {
  batchAnnotateImages(request: VisionAnnotateRequest): Promise<[VisionBatchResponse, ...unknown[]]>;
}

export interface GoogleVisionLocatorOptions {
  /** Path to a service account key file; ambient credentials when omitted */
  keyFilename?: string;
  minConfidence?: number;
  /** Prebuilt client, mainly for tests */
  client?: VisionClient;
}

function wordToToken(word: VisionWord, minConfidence: number): Token | null {
  const symbols = word.symbols ?? [];
  const text = symbols.map(symbol => symbol.text ?? '').join('');
  const confidence = symbols.length > 0
    ? symbols.reduce((sum, symbol) => sum + (symbol.confidence ?? 0), 0) / symbols.length
    : 0;

  const vertices = word.boundingBox?.vertices ?? [];
  if (vertices.length === 0) return null;

  const centerY = vertices.reduce((sum, v) => sum + (v.y ?? 0), 0) / vertices.length;
  const centerX = vertices.reduce((sum, v) => sum + (v.x ?? 0), 0) / vertices.length;

  return toToken(text, centerY, centerX, confidence, minConfidence);
}

/**
 * Flatten a full text annotation into word tokens, in the response's
 * page → block → paragraph → word order.
 */
export function visionAnnotationToTokens(
  annotation: VisionTextAnnotation | null | undefined,
  minConfidence: number = DEFAULT_MIN_CONFIDENCE
): Token[] {
  const tokens: Token[] = [];
  if (annotation === null || annotation === undefined) return tokens;

  for (const page of annotation.pages ?? []) {
    for (const block of page.blocks ?? []) {
      for (const paragraph of block.paragraphs ?? []) {
        for (const word of paragraph.words ?? []) {
          const token = wordToToken(word, minConfidence);
          if (token !== null) {
            tokens.push(token);
          }
        }
      }
    }
  }

  return tokens;
}

export class GoogleVisionLocator implements TokenLocator {
  readonly name = 'GOOGLE_VISION';
  private readonly client: VisionClient;
  private readonly minConfidence: number;

  constructor(options: GoogleVisionLocatorOptions = {}) {
    this.client = options.client ?? new ImageAnnotatorClient(
      options.keyFilename !== undefined ? { keyFilename: options.keyFilename } : {}
    );
    this.minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  }

  async locate(image: ImageSource): Promise<Token[]> {
    const [batch] = await this.client.batchAnnotateImages({
      requests: [
        {
          image: { content: Buffer.from(image.data) },
          features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
        },
      ],
    });

    const response = batch.responses?.[0];
    const errorMessage = response?.error?.message;
    if (errorMessage !== undefined && errorMessage !== null && errorMessage !== '') {
      throw new Error(`Google Vision error: ${errorMessage}`);
    }

    return visionAnnotationToTokens(response?.fullTextAnnotation, this.minConfidence);
  }
}
