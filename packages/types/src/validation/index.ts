export {
  validateResultDocument,
  validateResultDocumentOrThrow,
  formatValidationErrors,
  getResultSchemaPath,
} from './result-validator.js';

export type { ValidationResult, ValidationError } from './result-validator.js';
