/**
 * Raised while setting up locators when no recognition backend can be used.
 * Per-call failures never throw; they come back as failed ExtractionResults.
 */
export class BackendUnavailableError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'BackendUnavailableError';
    this.missing = missing;
  }
}

export function isBackendUnavailableError(error: unknown): error is BackendUnavailableError {
  return error instanceof BackendUnavailableError;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
