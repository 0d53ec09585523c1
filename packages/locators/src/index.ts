// Locator contract
export { toToken, DEFAULT_MIN_CONFIDENCE } from './locator.js';
export type { TokenLocator } from './locator.js';

// Backends
export {
  GoogleVisionLocator,
  visionAnnotationToTokens,
  type GoogleVisionLocatorOptions,
  type VisionTextAnnotation,
  type VisionClient,
  type VisionBatchResponse,
} from './google-vision.js';

export {
  GeminiLocator,
  parseGeminiTokens,
  DEFAULT_GEMINI_MODEL,
  GEMINI_POSITION_SCALE,
  GEMINI_TOKEN_PROMPT,
  type GeminiLocatorOptions,
} from './gemini.js';

export { StaticLocator } from './static-locator.js';

// Ordered fallback + retry
export { LocatorChain, type LocatorChainOptions, type LocatorFailure } from './chain.js';
export {
  withRetry,
  isTransientBackendError,
  backoffDelay,
  TRANSIENT_GRPC_CODES,
  type RetryOptions,
  type BackoffSettings,
} from './retry.js';

// Configuration
export {
  loadLocatorConfig,
  createLocators,
  LocatorConfigSchema,
  BACKEND_IDS,
  type BackendId,
  type LocatorConfig,
} from './config.js';

// Image files
export {
  loadImageSource,
  mimeTypeForPath,
  scanDirectoryForImages,
  validateDirectory,
  SUPPORTED_IMAGE_EXTENSIONS,
  type ImageFileInfo,
  type ScanResult,
  type SkippedFile,
  type DirectoryCheck,
} from './image-files.js';
