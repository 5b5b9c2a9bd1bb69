/**
 * @fileoverview Async Utilities
 *
 * Per-call timeouts and latency measurement for the outbound index and model
 * calls.
 *
 * @packageDocumentation
 */

export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * A missing, non-finite or non-positive `timeoutMs` disables the timeout and
 * returns the promise as-is.
 *
 * @example
 * ```typescript
 * const output = await withTimeout(index.query(request), 5000, { context: 'kendra retrieve' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, options?.context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

export interface Timed<T> {
  value: T;
  latencyMs: number;
}

/**
 * Run `fn` and report how long it took. Rejections propagate untouched.
 */
export async function timed<T>(fn: () => Promise<T>): Promise<Timed<T>> {
  const startedAt = Date.now();
  const value = await fn();
  return { value, latencyMs: Date.now() - startedAt };
}
