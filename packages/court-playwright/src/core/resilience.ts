/**
 * Resilience helpers: fail-fast, retry with exponential backoff, error classification
 */

import type { SearchConfig } from '../types/index.js';

// ============================================
// Defaults
// ============================================

export const SEARCH_DEFAULTS: Required<SearchConfig> = {
  maxChallengeAttempts: 3,
  challengeWaitMs: 120000,
  navigationRetries: 2,
  resultPollAttempts: 3,
  retryBackoffMs: 1000,
  attemptTimeoutMs: 300000,
};

export function resolveSearchConfig(config?: SearchConfig): Required<SearchConfig> {
  return {
    maxChallengeAttempts: Math.max(1, config?.maxChallengeAttempts ?? SEARCH_DEFAULTS.maxChallengeAttempts),
    challengeWaitMs: config?.challengeWaitMs ?? SEARCH_DEFAULTS.challengeWaitMs,
    navigationRetries: Math.max(0, config?.navigationRetries ?? SEARCH_DEFAULTS.navigationRetries),
    resultPollAttempts: Math.max(1, config?.resultPollAttempts ?? SEARCH_DEFAULTS.resultPollAttempts),
    retryBackoffMs: config?.retryBackoffMs ?? SEARCH_DEFAULTS.retryBackoffMs,
    attemptTimeoutMs: config?.attemptTimeoutMs ?? SEARCH_DEFAULTS.attemptTimeoutMs,
  };
}

// ============================================
// Error classification
// ============================================

export type ErrorKind = 'transient' | 'selector_not_found' | 'permanent';

export function classifyError(error: unknown): ErrorKind {
  const msg = error instanceof Error ? error.message : String(error);
  const lower = msg.toLowerCase();

  if (
    lower.includes('timeout') ||
    lower.includes('etimedout') ||
    lower.includes('econnreset') ||
    lower.includes('econnrefused') ||
    lower.includes('enotfound') ||
    lower.includes('epipe') ||
    lower.includes('navigation') ||
    lower.includes('net::err_')
  ) {
    return 'transient';
  }

  if (
    lower.includes('not found') ||
    lower.includes('waiting for selector') ||
    lower.includes('waiting for locator') ||
    lower.includes('strict mode violation')
  ) {
    return 'selector_not_found';
  }

  return 'permanent';
}

// ============================================
// Timing
// ============================================

/** Delay before retry number `attempt` (0-based) */
export function backoffDelay(attempt: number, base: number): number {
  return base * Math.pow(2, attempt);
}

/**
 * Resolves after `ms`, or rejects with the signal's reason when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(signal.reason);
  if (ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles with `promise`, or rejects with the signal's reason as soon as
 * the signal aborts. The underlying work is not interrupted.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

// ============================================
// Fail-Fast
// ============================================

export async function failFast<T>(
  fn: () => Promise<T>,
  timeout: number,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Fail-fast: timeout of ${timeout}ms exceeded`));
    }, timeout);

    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

// ============================================
// Retry with exponential backoff
// ============================================

export interface RetryOptions {
  maxRetries: number;
  backoff: number;
  /** Decides whether an error deserves another try */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  signal?: AbortSignal;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const shouldRetry = opts.shouldRetry ?? ((error: unknown) => classifyError(error) === 'transient');
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await raceAbort(fn(), opts.signal);
    } catch (error) {
      lastError = error;
      if (opts.signal?.aborted) break;
      if (attempt === opts.maxRetries) break;
      if (!shouldRetry(error)) break;

      const delay = backoffDelay(attempt, opts.backoff);
      opts.onRetry?.(error, attempt + 1, delay);
      await sleep(delay, opts.signal);
    }
  }

  throw lastError;
}
