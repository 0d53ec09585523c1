/**
 * Tests for environment-driven locator configuration.
 */
import { describe, it, expect } from 'vitest';
import { loadLocatorConfig, createLocators, GeminiLocator, DEFAULT_GEMINI_MODEL } from '@gridscan/locators';
import { BackendUnavailableError } from '@gridscan/types';

describe('loadLocatorConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadLocatorConfig({})).toEqual({
      googleCredentials: undefined,
      geminiApiKey: undefined,
      geminiModel: DEFAULT_GEMINI_MODEL,
      backends: ['vision', 'gemini'],
      minConfidence: 0.2,
      retries: 0,
    });
  });

  it('should read every setting', () => {
    const config = loadLocatorConfig({
      GOOGLE_APPLICATION_CREDENTIALS: '/etc/gridscan/key.json',
      GEMINI_API_KEY: 'test-secret',
      GEMINI_MODEL: 'gemini-1.5-pro',
      GRIDSCAN_BACKENDS: 'gemini, vision',
      GRIDSCAN_MIN_CONFIDENCE: '0.5',
      GRIDSCAN_RETRIES: '3',
    });

    expect(config).toEqual({
      googleCredentials: '/etc/gridscan/key.json',
      geminiApiKey: 'test-secret',
      geminiModel: 'gemini-1.5-pro',
      backends: ['gemini', 'vision'],
      minConfidence: 0.5,
      retries: 3,
    });
  });

  it('should treat empty values and the sample key as unset', () => {
    const config = loadLocatorConfig({
      GOOGLE_APPLICATION_CREDENTIALS: '  ',
      GEMINI_API_KEY: 'your_gemini_api_key',
      GEMINI_MODEL: '',
      GRIDSCAN_BACKENDS: '',
    });

    expect(config.googleCredentials).toBeUndefined();
    expect(config.geminiApiKey).toBeUndefined();
    expect(config.geminiModel).toBe(DEFAULT_GEMINI_MODEL);
    expect(config.backends).toEqual(['vision', 'gemini']);
  });

  it('should normalize and deduplicate the backend list', () => {
    const config = loadLocatorConfig({ GRIDSCAN_BACKENDS: 'Gemini,GEMINI,vision,' });

    expect(config.backends).toEqual(['gemini', 'vision']);
  });

  it('should prefer an explicit backend list over the environment', () => {
    const config = loadLocatorConfig({ GRIDSCAN_BACKENDS: 'vision' }, { backends: 'gemini' });

    expect(config.backends).toEqual(['gemini']);
  });

  it('should reject unknown backends', () => {
    expect(() => loadLocatorConfig({ GRIDSCAN_BACKENDS: 'vision,tesseract' })).toThrow(
      'Invalid locator configuration'
    );
  });

  it('should reject out-of-range numbers', () => {
    expect(() => loadLocatorConfig({ GRIDSCAN_MIN_CONFIDENCE: '1.5' })).toThrow('minConfidence');
    expect(() => loadLocatorConfig({ GRIDSCAN_RETRIES: '11' })).toThrow('retries');
    expect(() => loadLocatorConfig({ GRIDSCAN_RETRIES: 'many' })).toThrow('retries');
  });
});

describe('createLocators', () => {
  it('should build only the backends that have credentials', () => {
    const locators = createLocators(loadLocatorConfig({ GEMINI_API_KEY: 'test-secret' }));

    expect(locators).toHaveLength(1);
    expect(locators[0]).toBeInstanceOf(GeminiLocator);
    expect(locators[0]?.name).toBe('GEMINI_VISION');
  });

  it('should skip backends left out of the list', () => {
    expect(() =>
      createLocators(loadLocatorConfig({ GEMINI_API_KEY: 'test-secret', GRIDSCAN_BACKENDS: 'vision' }))
    ).toThrow(BackendUnavailableError);
  });

  it('should name every missing credential when nothing is available', () => {
    try {
      createLocators(loadLocatorConfig({}));
      expect.unreachable('createLocators should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(BackendUnavailableError);
      if (error instanceof BackendUnavailableError) {
        expect(error.message).toBe(
          'No OCR backend available. Set GOOGLE_APPLICATION_CREDENTIALS or GEMINI_API_KEY'
        );
        expect(error.missing).toEqual(['GOOGLE_APPLICATION_CREDENTIALS', 'GEMINI_API_KEY']);
      }
    }
  });
});
