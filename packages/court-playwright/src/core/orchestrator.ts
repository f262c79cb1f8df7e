/**
 * Search orchestrator
 *
 * Drives one search attempt through its states:
 *
 *   init -> form_filled -> submitted -> challenge_pending
 *        -> challenge_resolved -> result_ready -> success | failed
 *
 * Every attempt opens exactly one SearchAttempt row before anything else
 * happens and records exactly one outcome on it, whatever the path.
 * The browsing session belongs to the attempt and is always closed.
 */

import { randomUUID } from 'crypto';
import { EventEmitter } from 'eventemitter3';
import type {
  AttemptOutcome,
  CaseQuery,
  CaseRecord,
  CaseResultParser,
  ChallengeArtifact,
  ChallengeResolver,
  FailureKind,
  ResultPage,
  SearchConfig,
  SearchEvents,
  SearchLogger,
  SearchPortal,
  SearchResult,
  SearchState,
  SearchStore,
  SessionDriver,
} from '../types/index.js';
import { caseKey, normalizeCaseNumber, normalizeCaseType } from '../highcourt/catalogue.js';
import { ChallengeExchange } from './challenge-exchange.js';
import {
  AttemptTimeoutError,
  CancelledError,
  CaseNotFoundError,
  ChallengeExhaustedError,
  NavigationError,
  ParseError,
  SearchError,
  SiteUnreachableError,
  describeCause,
  toSearchError,
  toSearchFailure,
} from './errors.js';
import { createConsoleLogger } from './logger.js';
import { backoffDelay, classifyError, raceAbort, resolveSearchConfig, sleep, withRetry } from './resilience.js';
import { validateQuery, type ValidationOptions } from './validation.js';

export interface SearchOrchestratorDeps<S> {
  sessions: SessionDriver<S>;
  portal: SearchPortal<S>;
  challenges: ChallengeResolver<S>;
  parser: CaseResultParser;
  store: SearchStore;
  /** Shared with whoever answers challenges; created when omitted */
  exchange?: ChallengeExchange;
  config?: SearchConfig;
  validation?: ValidationOptions;
  logger?: SearchLogger;
}

export interface SearchOptions {
  /** Id of the SearchAttempt row; generated when omitted */
  attemptId?: string;
  /** Aborting it cancels the attempt */
  signal?: AbortSignal;
}

/** Outcome stored on the attempt row for each failure kind */
export function outcomeFor(kind: FailureKind): Exclude<AttemptOutcome, 'pending' | 'success'> {
  switch (kind) {
    case 'ChallengeTimeout':
    case 'AttemptTimeout':
      return 'timeout';
    case 'ChallengeExhausted':
      return 'captcha_required';
    default:
      return 'failure';
  }
}

function isTransient(error: unknown): boolean {
  return error instanceof SearchError ? error.retryable : classifyError(error) !== 'permanent';
}

export class SearchOrchestrator<S> extends EventEmitter<SearchEvents> {
  readonly exchange: ChallengeExchange;
  private readonly sessions: SessionDriver<S>;
  private readonly portal: SearchPortal<S>;
  private readonly challenges: ChallengeResolver<S>;
  private readonly parser: CaseResultParser;
  private readonly store: SearchStore;
  private readonly config: Required<SearchConfig>;
  private readonly validation: ValidationOptions;
  private readonly logger: SearchLogger;
  private readonly running = new Map<string, AbortController>();

  constructor(deps: SearchOrchestratorDeps<S>) {
    super();
    this.sessions = deps.sessions;
    this.portal = deps.portal;
    this.challenges = deps.challenges;
    this.parser = deps.parser;
    this.store = deps.store;
    this.exchange = deps.exchange ?? new ChallengeExchange();
    this.config = resolveSearchConfig(deps.config);
    this.validation = deps.validation ?? {};
    this.logger = deps.logger ?? createConsoleLogger('search');

    this.exchange.on('challenge:pending', (challenge) => {
      if (this.running.has(challenge.attemptId)) this.emit('search:challenge', challenge);
    });
  }

  /** Attempts currently in flight */
  get activeAttempts(): string[] {
    return [...this.running.keys()];
  }

  /**
   * Runs one search attempt. Never throws: failures come back as
   * `{ success: false }` with a stable kind.
   */
  async search(query: CaseQuery, options: SearchOptions = {}): Promise<SearchResult> {
    const attemptId = options.attemptId ?? randomUUID();
    const controller = new AbortController();
    const { signal } = controller;

    const onExternalAbort = () => controller.abort(new CancelledError());
    if (options.signal?.aborted) onExternalAbort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    const budget = this.config.attemptTimeoutMs;
    const timer = setTimeout(() => controller.abort(new AttemptTimeoutError(budget)), budget);
    this.running.set(attemptId, controller);

    let logged = false;
    try {
      this.setState(attemptId, 'init');
      await this.store.logAttempt({
        id: attemptId,
        caseType: typeof query.caseType === 'string' ? normalizeCaseType(query.caseType) : '',
        caseNumber: typeof query.caseNumber === 'string' ? normalizeCaseNumber(query.caseNumber) : '',
        year: Number.isInteger(query.year) ? query.year : null,
        submittedAt: new Date(),
        outcome: 'pending',
        errorKind: null,
        errorDetail: null,
        completedAt: null,
        caseId: null,
      });
      logged = true;

      const valid = validateQuery(query, this.validation);
      this.setState(attemptId, 'form_filled');
      this.logger.info('Search started', { attemptId, case: caseKey(valid.caseType, valid.caseNumber, valid.year) });

      const record = await this.run(attemptId, valid, signal);

      const upsert = await this.store.upsertCase(record);
      await this.store.recordOutcome(attemptId, { outcome: 'success', caseId: upsert.caseId });

      this.setState(attemptId, 'success');
      this.logger.info('Search succeeded', {
        attemptId,
        caseId: upsert.caseId,
        created: upsert.created,
        ordersInserted: upsert.ordersInserted,
        ordersUpdated: upsert.ordersUpdated,
      });
      this.emit('search:success', { attemptId, caseId: upsert.caseId, record });
      return { success: true, attemptId, caseId: upsert.caseId, record };
    } catch (error) {
      const failure = signal.aborted && signal.reason instanceof SearchError
        ? signal.reason
        : toSearchError(error);

      if (logged) await this.recordFailure(attemptId, failure);

      this.setState(attemptId, 'failed');
      const level = failure.kind === 'ValidationError' || failure.kind === 'CaseNotFound' ? 'info' : 'warn';
      this.logger[level]('Search failed', { attemptId, kind: failure.kind, detail: describeCause(failure) });
      this.emit('search:failed', { attemptId, failure: toSearchFailure(failure) });
      return { success: false, attemptId, failure: toSearchFailure(failure) };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onExternalAbort);
      this.running.delete(attemptId);
    }
  }

  /**
   * Cancels an attempt in flight. Returns false when it is not running.
   */
  cancel(attemptId: string): boolean {
    const controller = this.running.get(attemptId);
    if (!controller) return false;
    controller.abort(new CancelledError());
    return true;
  }

  // ============================================
  // Attempt
  // ============================================

  private async run(attemptId: string, query: CaseQuery, signal: AbortSignal): Promise<CaseRecord> {
    const session = await this.openSession(signal);

    try {
      await this.loadForm(attemptId, session, query, signal);
      const artifact = await raceAbort(this.challenges.extractChallenge(session), signal);
      if (!artifact) {
        await raceAbort(this.portal.submitSearch(session), signal);
      }
      this.setState(attemptId, 'submitted');

      this.setState(attemptId, 'challenge_pending');
      if (artifact) {
        await this.resolveChallenge(attemptId, session, query, artifact, signal);
      }
      this.setState(attemptId, 'challenge_resolved');

      const page = await this.pollResult(attemptId, session, query, signal);
      this.setState(attemptId, 'result_ready');

      return this.parser.parse(page, query);
    } finally {
      await this.closeSession(session);
    }
  }

  private async openSession(signal: AbortSignal): Promise<S> {
    const opening = this.sessions.open();
    try {
      return await raceAbort(opening, signal);
    } catch (error) {
      if (signal.aborted) {
        // the launch may still finish after the abort
        void opening.then(
          (session) => this.closeSession(session),
          (launchError: unknown) => this.logger.debug('Session launch failed after abort', { error: String(launchError) }),
        );
      }
      throw error;
    }
  }

  private async closeSession(session: S): Promise<void> {
    try {
      await this.sessions.close(session);
    } catch (error) {
      this.logger.warn('Failed to close session', { error: String(error) });
    }
  }

  /** Opens the search form and fills it, retrying transient failures */
  private async loadForm(attemptId: string, session: S, query: CaseQuery, signal: AbortSignal): Promise<void> {
    const tries = this.config.navigationRetries + 1;
    try {
      await withRetry(
        async () => {
          await this.portal.openSearchForm(session);
          await this.portal.fillSearchForm(session, query);
        },
        {
          maxRetries: this.config.navigationRetries,
          backoff: this.config.retryBackoffMs,
          signal,
          shouldRetry: isTransient,
          onRetry: (error, attempt, delay) => {
            this.logger.warn('Search form unavailable, retrying', {
              attemptId,
              attempt,
              delay,
              error: error instanceof Error ? error.message : String(error),
            });
          },
        },
      );
    } catch (error) {
      if (signal.aborted) throw error;
      if (error instanceof SearchError && !(error instanceof NavigationError)) throw error;
      throw new SiteUnreachableError(`The court website could not be reached after ${tries} attempt(s)`, { cause: error });
    }
  }

  // ============================================
  // Challenge
  // ============================================

  private async resolveChallenge(
    attemptId: string,
    session: S,
    query: CaseQuery,
    artifact: ChallengeArtifact,
    signal: AbortSignal,
  ): Promise<void> {
    const max = this.config.maxChallengeAttempts;
    let current = artifact;
    // the caller's code answers the first challenge only
    let supplied = query.captchaCode ?? null;

    for (let attempt = 1; attempt <= max; attempt++) {
      const code = supplied ?? await this.exchange.waitForCode(attemptId, current, this.config.challengeWaitMs, signal);
      supplied = null;

      const outcome = await raceAbort(this.challenges.submitResponse(session, code), signal);
      if (outcome === 'accepted') {
        this.logger.info('Challenge accepted', { attemptId, attempt });
        return;
      }

      this.logger.warn('Challenge not accepted', { attemptId, attempt, outcome });
      if (attempt === max) break;

      await sleep(backoffDelay(attempt - 1, this.config.retryBackoffMs), signal);
      await this.loadForm(attemptId, session, query, signal);

      const fresh = await raceAbort(this.challenges.refresh(session), signal);
      if (!fresh) {
        // the site dropped the challenge for this submission
        await raceAbort(this.portal.submitSearch(session), signal);
        return;
      }
      current = fresh;
    }

    throw new ChallengeExhaustedError(max);
  }

  // ============================================
  // Result
  // ============================================

  private async pollResult(attemptId: string, session: S, query: CaseQuery, signal: AbortSignal): Promise<ResultPage> {
    const polls = this.config.resultPollAttempts;
    let lastError: unknown;

    for (let poll = 0; poll < polls; poll++) {
      if (poll > 0) {
        await sleep(backoffDelay(poll - 1, this.config.retryBackoffMs), signal);
      }

      let page: ResultPage;
      try {
        page = await raceAbort(this.portal.readResultPage(session), signal);
      } catch (error) {
        if (signal.aborted || !isTransient(error)) throw error;
        lastError = error;
        this.logger.warn('Result page read failed', {
          attemptId,
          poll: poll + 1,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      const kind = this.parser.detectPage(page.html);
      if (kind === 'result') return page;
      if (kind === 'not_found') throw new CaseNotFoundError(caseKey(query.caseType, query.caseNumber, query.year));
      if (kind === 'error') throw new ParseError();

      this.logger.debug('Result page not ready', { attemptId, poll: poll + 1 });
    }

    throw new SiteUnreachableError(
      `The result page did not load after ${polls} read(s)`,
      lastError === undefined ? undefined : { cause: lastError },
    );
  }

  // ============================================
  // Bookkeeping
  // ============================================

  private async recordFailure(attemptId: string, failure: SearchError): Promise<void> {
    try {
      await this.store.recordOutcome(attemptId, {
        outcome: outcomeFor(failure.kind),
        errorKind: failure.kind,
        errorDetail: describeCause(failure),
      });
    } catch (error) {
      this.logger.error('Failed to record search outcome', {
        attemptId,
        kind: failure.kind,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private setState(attemptId: string, state: SearchState): void {
    this.logger.debug('Search state', { attemptId, state });
    this.emit('search:state', { attemptId, state });
  }
}
