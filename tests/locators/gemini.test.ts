/**
 * Tests for the Gemini response parser and locator.
 */
import { describe, it, expect, vi } from 'vitest';
import { GeminiLocator, parseGeminiTokens, GEMINI_TOKEN_PROMPT } from '@gridscan/locators';

describe('parseGeminiTokens', () => {
  it('should parse well-formed lines and scale positions', () => {
    const tokens = parseGeminiTokens('Book|5|10|85\nPrice|5|30|90%');

    expect(tokens).toEqual([
      { text: 'Book', y: 100, x: 200, confidence: 0.85 },
      { text: 'Price', y: 100, x: 600, confidence: 0.9 },
    ]);
  });

  it('should skip lines without enough fields', () => {
    const text = [
      'Here is the text I found:',
      'Total|12|4',
      'Total|12|4|70',
    ].join('\n');

    expect(parseGeminiTokens(text)).toEqual([{ text: 'Total', y: 240, x: 80, confidence: 0.7 }]);
  });

  it('should skip lines with non-integer positions or confidence', () => {
    const text = [
      'Alpha|1.5|2|90',
      'Beta|one|2|90',
      'Gamma|1|2|high',
      'Delta|1|2|',
      'Epsilon|1|2|60',
    ].join('\n');

    expect(parseGeminiTokens(text).map(token => token.text)).toEqual(['Epsilon']);
  });

  it('should trim fields and ignore extra ones', () => {
    expect(parseGeminiTokens('  Net  | 3 | 7 | 55 % | note')).toEqual([
      { text: 'Net', y: 60, x: 140, confidence: 0.55 },
    ]);
  });

  it('should drop tokens below the minimum confidence', () => {
    const tokens = parseGeminiTokens('faint|1|1|15\nclear|2|1|20');

    expect(tokens.map(token => token.text)).toEqual(['clear']);
  });

  it('should honor a custom minimum confidence', () => {
    expect(parseGeminiTokens('mid|1|1|50', 0.6)).toEqual([]);
  });

  it('should drop tokens with empty text', () => {
    expect(parseGeminiTokens(' |1|1|90')).toEqual([]);
  });

  it('should return nothing for an empty response', () => {
    expect(parseGeminiTokens('')).toEqual([]);
  });
});

describe('GeminiLocator', () => {
  it('should send the prompt with the image inline', async () => {
    const generateContent = vi.fn().mockResolvedValue({
      response: { text: () => 'Qty|1|1|90\n4|2|1|80' },
    });
    const locator = new GeminiLocator({ apiKey: 'test-secret', generativeModel: { generateContent } });

    const tokens = await locator.locate({ data: new Uint8Array([104, 105]), mimeType: 'image/jpeg' });

    expect(locator.name).toBe('GEMINI_VISION');
    expect(generateContent).toHaveBeenCalledWith([
      GEMINI_TOKEN_PROMPT,
      { inlineData: { data: 'aGk=', mimeType: 'image/jpeg' } },
    ]);
    expect(tokens).toEqual([
      { text: 'Qty', y: 20, x: 20, confidence: 0.9 },
      { text: '4', y: 40, x: 20, confidence: 0.8 },
    ]);
  });

  it('should propagate model errors', async () => {
    const generateContent = vi.fn().mockRejectedValue(new Error('API key not valid'));
    const locator = new GeminiLocator({ apiKey: 'test-secret', generativeModel: { generateContent } });

    await expect(locator.locate({ data: new Uint8Array(), mimeType: 'image/png' })).rejects.toThrow(
      'API key not valid'
    );
  });
});
