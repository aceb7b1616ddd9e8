import { logger } from './logger.js';

export class NonRetryableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NonRetryableError';
  }
}

interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

/** `base * 2^(attempt-1)`, capped at `maxMs`. `attempt` is 1-based. */
export function computeBackoffMs(attempt: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs = 1_000, maxDelayMs = 60_000,
    isRetryable = (e) => !(e instanceof NonRetryableError), onRetry } = opts;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try { return await fn(); }
    catch (err) {
      lastErr = err;
      if (!isRetryable(err) || attempt === maxAttempts) throw err;
      const delay = computeBackoffMs(attempt, baseDelayMs, maxDelayMs);
      logger.warn(`Retry ${attempt}/${maxAttempts} in ${delay}ms`, { error: String(err) });
      onRetry?.(attempt, err);
      await new Promise(r => setTimeout(r, delay));
    }
  }
  throw lastErr;
}
