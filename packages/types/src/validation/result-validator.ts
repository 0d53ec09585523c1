/**
 * AJV-based JSON Schema validation for the JSON result document.
 */

import { Ajv } from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

let compiledValidator: ValidateFunction | null = null;

/**
 * Location of the bundled result document schema.
 */
export function getResultSchemaPath(): string {
  return resolve(__dirname, '../../schemas/result_document.v1.schema.json');
}

function getValidator(): ValidateFunction {
  if (compiledValidator === null) {
    const ajv = new Ajv({ allErrors: true, verbose: true, allowUnionTypes: true });
    compiledValidator = ajv.compile(JSON.parse(readFileSync(getResultSchemaPath(), 'utf-8')));
  }
  return compiledValidator;
}

export function validateResultDocument(document: unknown): ValidationResult {
  const validate = getValidator();
  const valid = validate(document);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

export function validateResultDocumentOrThrow(document: unknown): void {
  const result = validateResultDocument(document);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`Result document validation failed:\n${errorMessages}`);
  }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => `[${e.keyword}] ${e.path}: ${e.message}`);
}
