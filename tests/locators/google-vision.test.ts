/**
 * Tests for the Vision annotation walk and locator.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  GoogleVisionLocator,
  visionAnnotationToTokens,
  type VisionBatchResponse,
  type VisionTextAnnotation,
} from '@gridscan/locators';

function word(text: string, box: [number, number, number, number], confidence = 0.75) {
  const [x0, y0, x1, y1] = box;
  return {
    symbols: [...text].map(char => ({ text: char, confidence })),
    boundingBox: {
      vertices: [
        { x: x0, y: y0 },
        { x: x1, y: y0 },
        { x: x1, y: y1 },
        { x: x0, y: y1 },
      ],
    },
  };
}

describe('visionAnnotationToTokens', () => {
  it('should build one token per word at the box center', () => {
    const annotation: VisionTextAnnotation = {
      pages: [{ blocks: [{ paragraphs: [{ words: [word('Total', [10, 20, 61, 33])] }] }] }],
    };

    expect(visionAnnotationToTokens(annotation)).toEqual([
      { text: 'Total', y: 26, x: 35, confidence: 0.75 },
    ]);
  });

  it('should average symbol confidences', () => {
    const annotation: VisionTextAnnotation = {
      pages: [{
        blocks: [{
          paragraphs: [{
            words: [{
              symbols: [{ text: 'o', confidence: 0.5 }, { text: 'k', confidence: 1 }],
              boundingBox: { vertices: [{ x: 0, y: 0 }, { x: 10, y: 10 }] },
            }],
          }],
        }],
      }],
    };

    expect(visionAnnotationToTokens(annotation)).toEqual([
      { text: 'ok', y: 5, x: 5, confidence: 0.75 },
    ]);
  });

  it('should walk blocks and paragraphs in response order', () => {
    const annotation: VisionTextAnnotation = {
      pages: [{
        blocks: [
          { paragraphs: [{ words: [word('A', [0, 0, 10, 10]), word('B', [20, 0, 30, 10])] }] },
          { paragraphs: [{ words: [word('C', [0, 40, 10, 50])] }, { words: [word('D', [20, 40, 30, 50])] }] },
        ],
      }],
    };

    expect(visionAnnotationToTokens(annotation).map(token => token.text)).toEqual(['A', 'B', 'C', 'D']);
  });

  it('should drop low-confidence words and words without symbols or boxes', () => {
    const annotation: VisionTextAnnotation = {
      pages: [{
        blocks: [{
          paragraphs: [{
            words: [
              word('faint', [0, 0, 10, 10], 0.1),
              { symbols: [], boundingBox: { vertices: [{ x: 0, y: 0 }] } },
              { symbols: [{ text: 'x', confidence: 0.9 }], boundingBox: null },
              word('K', [0, 0, 10, 10], 0.2),
            ],
          }],
        }],
      }],
    };

    expect(visionAnnotationToTokens(annotation).map(token => token.text)).toEqual(['K']);
  });

  it('should treat missing vertex coordinates as zero', () => {
    const annotation: VisionTextAnnotation = {
      pages: [{
        blocks: [{
          paragraphs: [{
            words: [{
              symbols: [{ text: 'Q', confidence: 0.8 }],
              boundingBox: { vertices: [{ y: 10 }, { x: 20, y: 10 }, { x: 20, y: 30 }, { y: 30 }] },
            }],
          }],
        }],
      }],
    };

    expect(visionAnnotationToTokens(annotation)).toEqual([{ text: 'Q', y: 20, x: 10, confidence: 0.8 }]);
  });

  it('should return nothing for a missing annotation', () => {
    expect(visionAnnotationToTokens(null)).toEqual([]);
    expect(visionAnnotationToTokens(undefined)).toEqual([]);
    expect(visionAnnotationToTokens({ pages: null })).toEqual([]);
  });
});

describe('GoogleVisionLocator', () => {
  function clientReturning(response: VisionBatchResponse) {
    return {
      batchAnnotateImages: vi.fn(async (): Promise<[VisionBatchResponse]> => [response]),
    };
  }

  it('should request document text detection and convert the answer', async () => {
    const client = clientReturning({
      responses: [{
        fullTextAnnotation: {
          pages: [{ blocks: [{ paragraphs: [{ words: [word('Net', [100, 200, 140, 220], 0.5)] }] }] }],
        },
      }],
    });
    const locator = new GoogleVisionLocator({ client });

    const tokens = await locator.locate({ data: new Uint8Array([7, 7]), mimeType: 'image/png' });

    expect(locator.name).toBe('GOOGLE_VISION');
    expect(tokens).toEqual([{ text: 'Net', y: 210, x: 120, confidence: 0.5 }]);
    expect(client.batchAnnotateImages).toHaveBeenCalledWith({
      requests: [{
        image: { content: Buffer.from([7, 7]) },
        features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
      }],
    });
  });

  it('should throw the error reported in the response', async () => {
    const locator = new GoogleVisionLocator({
      client: clientReturning({ responses: [{ error: { message: 'Bad image data.' } }] }),
    });

    await expect(locator.locate({ data: new Uint8Array(), mimeType: 'image/png' })).rejects.toThrow(
      'Google Vision error: Bad image data.'
    );
  });

  it('should return nothing when the response has no annotation', async () => {
    const locator = new GoogleVisionLocator({ client: clientReturning({ responses: [{}] }) });

    await expect(locator.locate({ data: new Uint8Array(), mimeType: 'image/png' })).resolves.toEqual([]);
  });
});
