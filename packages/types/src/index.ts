// Types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// JSON result document validation (AJV)
export * from './validation/index.js';

// Pure utils (stats, constants)
export * from './utils/index.js';

export { BackendUnavailableError, isBackendUnavailableError, errorMessage } from './errors.js';
