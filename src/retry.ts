import { log } from './log';

export interface RetryOptions {
  label: string;
  retries?: number;
  baseDelayMs?: number;
  isRetryable?: (err: unknown) => boolean;
}

/**
 * Retry an async operation with short exponential backoff.
 * By default only transient errors (5xx, timeouts, connection resets) are retried.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const maxRetries = opts.retries ?? 1;
  const baseDelay = opts.baseDelayMs ?? 250;
  const isRetryable = opts.isRetryable ?? isTransient;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;
      if (attempt >= maxRetries || !isRetryable(err)) {
        throw err;
      }
      const delay = baseDelay * Math.pow(2, attempt);
      log.warn(
        { event: 'retry', label: opts.label, attempt: attempt + 1, maxRetries, delayMs: delay, err },
        `${opts.label} transient error, retrying`,
      );
      await sleep(delay);
    }
  }
  throw lastError;
}

export function isTransient(err: unknown): boolean {
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    if (
      msg.includes('econnreset') ||
      msg.includes('econnrefused') ||
      msg.includes('etimedout') ||
      msg.includes('timeout') ||
      msg.includes('abort') ||
      msg.includes('socket hang up')
    ) {
      return true;
    }
    if (/\b5\d{2}\b/.test(msg)) return true;
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
