/**
 * Error classes of the search engine.
 *
 * Each class carries a stable `kind` (the value persisted in
 * SearchAttempt.errorKind and returned to callers) and whether the
 * orchestrator may retry it locally.
 */

import type { FailureKind, SearchFailure } from '../types/index.js';
import { classifyError } from './resilience.js';

const DETAIL_LIMIT = 500;

export class SearchError extends Error {
  public readonly kind: FailureKind;
  public readonly retryable: boolean;

  constructor(kind: FailureKind, message: string, retryable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchError';
    this.kind = kind;
    this.retryable = retryable;
  }
}

/** Request rejected before any network interaction */
export class ValidationError extends SearchError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('ValidationError', `Invalid search request: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A page did not load in time or the transport failed.
 * Retryable; surfaces as SiteUnreachable once retries run out.
 */
export class NavigationError extends SearchError {
  public readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('SiteUnreachable', message, true, options);
    this.name = 'NavigationError';
    this.url = url;
  }
}

export class SiteUnreachableError extends SearchError {
  constructor(message = 'The court website could not be reached', options?: { cause?: unknown }) {
    super('SiteUnreachable', message, false, options);
    this.name = 'SiteUnreachableError';
  }
}

export class ChallengeTimeoutError extends SearchError {
  constructor(waitMs: number) {
    super('ChallengeTimeout', `No CAPTCHA code was supplied within ${Math.round(waitMs / 1000)}s`);
    this.name = 'ChallengeTimeoutError';
  }
}

export class ChallengeExhaustedError extends SearchError {
  constructor(attempts: number) {
    super('ChallengeExhausted', `CAPTCHA was not accepted after ${attempts} attempt(s)`);
    this.name = 'ChallengeExhaustedError';
  }
}

/** The page is not a result page at all (error or maintenance page, empty shell) */
export class ParseError extends SearchError {
  constructor(message = 'The court website returned an unexpected page') {
    super('ParseError', message);
    this.name = 'ParseError';
  }
}

/** The court reports that no such case exists */
export class CaseNotFoundError extends SearchError {
  constructor(reference: string) {
    super('CaseNotFound', `No record found for ${reference}`);
    this.name = 'CaseNotFoundError';
  }
}

export class StorageError extends SearchError {
  /** True when the write lost a race and may be retried by the caller */
  public readonly conflict: boolean;

  constructor(message: string, conflict = false, options?: { cause?: unknown }) {
    super('StorageError', message, false, options);
    this.name = 'StorageError';
    this.conflict = conflict;
  }
}

export class CancelledError extends SearchError {
  constructor(message = 'The search was cancelled') {
    super('Cancelled', message);
    this.name = 'CancelledError';
  }
}

export class AttemptTimeoutError extends SearchError {
  constructor(budgetMs: number) {
    super('AttemptTimeout', `The search did not finish within ${Math.round(budgetMs / 1000)}s`);
    this.name = 'AttemptTimeoutError';
  }
}

// ============================================
// Classification
// ============================================

/**
 * Converts any thrown value into a SearchError. Unknown errors come from
 * browser automation, so transient ones read as SiteUnreachable.
 */
export function toSearchError(error: unknown): SearchError {
  if (error instanceof SearchError) {
    if (error instanceof NavigationError) {
      return new SiteUnreachableError('The court website could not be reached', { cause: error });
    }
    return error;
  }

  const kind = classifyError(error);
  const message = kind === 'transient'
    ? 'The court website did not respond in time'
    : 'The court website could not be processed';
  return new SiteUnreachableError(message, { cause: error });
}

/** Caller-facing failure; never contains stacks or page content */
export function toSearchFailure(error: SearchError): SearchFailure {
  return { kind: error.kind, message: error.message };
}

/** Detail kept in SearchAttempt.errorDetail */
export function describeCause(error: SearchError): string {
  const cause = error.cause;
  const detail = cause instanceof Error
    ? `${error.message}: ${cause.message}`
    : error.message;
  return detail.length > DETAIL_LIMIT ? `${detail.slice(0, DETAIL_LIMIT - 3)}...` : detail;
}
