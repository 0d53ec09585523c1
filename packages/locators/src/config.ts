/**
 * Locator configuration from environment variables.
 */
import { z } from 'zod';
import { BackendUnavailableError } from '@gridscan/types';
import { DEFAULT_MIN_CONFIDENCE, type TokenLocator } from './locator.js';
import { GoogleVisionLocator } from './google-vision.js';
import { GeminiLocator, DEFAULT_GEMINI_MODEL } from './gemini.js';

export const BACKEND_IDS = ['vision', 'gemini'] as const;
export type BackendId = typeof BACKEND_IDS[number];

/** Sample value shipped in .env templates; treated as no key */
const PLACEHOLDER_GEMINI_KEY = 'your_gemini_api_key';

const BackendIdSchema = z.enum(BACKEND_IDS);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

export const LocatorConfigSchema = z.object({
  googleCredentials: optionalString,
  geminiApiKey: optionalString.transform((value) =>
    value === PLACEHOLDER_GEMINI_KEY ? undefined : value
  ),
  geminiModel: z.string().min(1).default(DEFAULT_GEMINI_MODEL),
  backends: z
    .array(BackendIdSchema)
    .min(1)
    .transform((ids) => [...new Set(ids)])
    .default(['vision', 'gemini']),
  minConfidence: z.coerce.number().min(0).max(1).default(DEFAULT_MIN_CONFIDENCE),
  retries: z.coerce.number().int().min(0).max(10).default(0),
});
export type LocatorConfig = z.infer<typeof LocatorConfigSchema>;

function parseBackendList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value
    .split(',')
    .map((id) => id.trim().toLowerCase())
    .filter((id) => id !== '');
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Read locator settings from an environment map.
 *
 * - GOOGLE_APPLICATION_CREDENTIALS: Vision service account key file
 * - GEMINI_API_KEY, GEMINI_MODEL: Gemini access
 * - GRIDSCAN_BACKENDS: comma-separated order, e.g. "gemini,vision"
 * - GRIDSCAN_MIN_CONFIDENCE: drop tokens below this confidence
 * - GRIDSCAN_RETRIES: retries per backend on transient errors
 */
export function loadLocatorConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: { backends?: string } = {}
): LocatorConfig {
  const result = LocatorConfigSchema.safeParse({
    googleCredentials: env['GOOGLE_APPLICATION_CREDENTIALS'],
    geminiApiKey: env['GEMINI_API_KEY'],
    geminiModel: emptyToUndefined(env['GEMINI_MODEL']),
    backends: parseBackendList(overrides.backends ?? env['GRIDSCAN_BACKENDS']),
    minConfidence: emptyToUndefined(env['GRIDSCAN_MIN_CONFIDENCE']),
    retries: emptyToUndefined(env['GRIDSCAN_RETRIES']),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid locator configuration: ${issues}`);
  }

  return result.data;
}

/**
 * Instantiate every configured backend that has credentials, in the
 * configured order.
 *
 * @throws BackendUnavailableError when no backend can be used
 */
export function createLocators(config: LocatorConfig): TokenLocator[] {
  const locators: TokenLocator[] = [];
  const missing: string[] = [];

  for (const backend of config.backends) {
    switch (backend) {
      case 'vision':
        if (config.googleCredentials === undefined) {
          missing.push('GOOGLE_APPLICATION_CREDENTIALS');
        } else {
          locators.push(new GoogleVisionLocator({
            keyFilename: config.googleCredentials,
            minConfidence: config.minConfidence,
          }));
        }
        break;
      case 'gemini':
        if (config.geminiApiKey === undefined) {
          missing.push('GEMINI_API_KEY');
        } else {
          locators.push(new GeminiLocator({
            apiKey: config.geminiApiKey,
            model: config.geminiModel,
            minConfidence: config.minConfidence,
          }));
        }
        break;
    }
  }

  if (locators.length === 0) {
    throw new BackendUnavailableError(
      `No OCR backend available. Set ${missing.join(' or ')}`,
      missing
    );
  }

  return locators;
}
