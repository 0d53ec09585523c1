/**
 * Exponential backoff around recognition backend calls.
 * Only transient failures (quota, deadline, unavailable) are retried.
 */
import { errorMessage } from '@gridscan/types';

export interface RetryOptions {
  /** Retries after the first attempt (default: 0) */
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Decides whether a failure is worth another attempt (default: isTransientBackendError) */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Jitter source returning values in [0, 1) (default: Math.random) */
  random?: () => number;
}

export interface BackoffSettings {
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

const DEFAULT_BACKOFF: BackoffSettings = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/** Up to this fraction of the base delay is added as jitter */
const JITTER_RATIO = 0.3;

/**
 * gRPC status codes the Vision client reports for transient conditions:
 * DEADLINE_EXCEEDED, RESOURCE_EXHAUSTED, UNAVAILABLE.
 */
export const TRANSIENT_GRPC_CODES: ReadonlySet<number> = new Set([4, 8, 14]);

/**
 * True for a transient gRPC code (Vision) or HTTP 429/5xx status (Gemini).
 */
export function isTransientBackendError(error: unknown): boolean {
  if (error === null || typeof error !== 'object') {
    return false;
  }

  if ('code' in error && typeof error.code === 'number') {
    return TRANSIENT_GRPC_CODES.has(error.code);
  }

  if ('status' in error && typeof error.status === 'number') {
    return error.status === 429 || (error.status >= 500 && error.status < 600);
  }

  return false;
}

/**
 * Delay before retry number `attempt` (1-based): the exponential base delay
 * plus up to 30% jitter, capped at maxDelayMs.
 */
export function backoffDelay(
  attempt: number,
  settings: BackoffSettings = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const base = settings.initialDelayMs * Math.pow(settings.backoffMultiplier, attempt - 1);
  return Math.min(base + random() * JITTER_RATIO * base, settings.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

/**
 * Run an operation, retrying transient failures with backoff.
 * The last failure is rethrown once retries are used up.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? 0;
  const isRetryable = options.isRetryable ?? isTransientBackendError;
  const settings: BackoffSettings = {
    initialDelayMs: options.initialDelayMs ?? DEFAULT_BACKOFF.initialDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_BACKOFF.backoffMultiplier,
  };

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt > maxRetries || !isRetryable(error)) {
        throw toError(error);
      }

      const delayMs = backoffDelay(attempt, settings, options.random);
      options.onRetry?.(attempt, toError(error), delayMs);
      await sleep(delayMs);
    }
  }
}
