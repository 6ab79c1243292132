/**
 * Retry Utilities
 *
 * Bounded retry with increasing backoff for read-only provider calls.
 * Launch and delete calls must not go through here.
 */

import { ProviderApiError, errorMessage } from './errors.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total attempts including the first (default 3) */
  attempts?: number;
  /** Delay before attempt n+1 is baseDelayMs * n (default 1000) */
  baseDelayMs?: number;
  sleep?: Sleep;
  verbose?: boolean;
}

/**
 * Extract the AWS SDK error name (e.g. 'InvalidGroup.NotFound') when present
 */
export function getErrorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'name' in e && typeof e.name === 'string') {
    return e.name;
  }
  return undefined;
}

/**
 * Run a read operation, retrying transient failures.
 *
 * @param operation - Name used in logs and in the final ProviderApiError
 * @throws ProviderApiError once every attempt has failed
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const wait = options.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (e) {
      lastError = e;
      if (options.verbose) {
        console.log(`   ${operation} attempt ${attempt}/${attempts} failed: ${errorMessage(e)}`);
      }
      if (attempt < attempts) {
        await wait(baseDelayMs * attempt);
      }
    }
  }

  throw new ProviderApiError(operation, errorMessage(lastError), {
    cause: lastError,
    providerCode: getErrorCode(lastError),
  });
}

/**
 * Run a mutating provider call exactly once, wrapping any failure in
 * ProviderApiError
 */
export async function callOnce<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof ProviderApiError) throw e;
    throw new ProviderApiError(operation, errorMessage(e), { cause: e, providerCode: getErrorCode(e) });
  }
}
