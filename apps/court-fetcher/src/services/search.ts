/**
 * Case search service
 *
 * Runs searches through the engine and keeps track of each run so the
 * HTTP layer can poll its state, show the pending challenge and relay
 * the human-supplied code.
 */

import { randomUUID } from 'crypto';
import {
  getCaseTypes,
  getCaseYears,
  type CaseDetail,
  type CaseQuery,
  type HistoryFilter,
  type HistoryPage,
  type Pagination,
  type PendingChallenge,
  type ProbeResult,
  type SearchOrchestrator,
  type SearchResult,
  type SearchStore,
} from 'court-playwright';
import type { HealthReport, SearchRun, SearchStatistics } from '../types/index.js';
import { logger } from '../utils/logger.js';

const SERVICE_VERSION = '0.1.0';
const MAX_PDF_REDIRECTS = 3;

/** Store operations the service needs beyond the engine's contract */
export interface CaseRepository extends SearchStore {
  findCase(caseType: string, caseNumber: string, year: number): Promise<CaseDetail | null>;
  getStatistics(): Promise<SearchStatistics>;
  ping(): Promise<boolean>;
}

export interface CaseSearchServiceDeps<S> {
  orchestrator: SearchOrchestrator<S>;
  store: CaseRepository;
  /** Checks that a browser can be started */
  probeBrowser: () => Promise<ProbeResult>;
  /** Searches allowed to run at the same time */
  maxConcurrent: number;
  /** Host PDFs may be downloaded from */
  courtBaseUrl: string;
  pdfTimeoutMs: number;
  /** Finished runs kept in memory for polling */
  retainedRuns?: number;
  fetch?: typeof fetch;
}

export type ChallengeAnswer = 'accepted' | 'not_pending' | 'stale';

export interface OrderPdf {
  body: Buffer;
  contentType: string;
  filename: string;
}

export class ServiceBusyError extends Error {
  constructor(limit: number) {
    super(`Too many searches in progress (limit ${limit})`);
    this.name = 'ServiceBusyError';
  }
}

export class PdfDownloadError extends Error {
  constructor(public readonly status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PdfDownloadError';
  }
}

export class CaseSearchService<S> {
  private readonly orchestrator: SearchOrchestrator<S>;
  private readonly store: CaseRepository;
  private readonly runs = new Map<string, SearchRun>();
  private readonly completions = new Map<string, Promise<SearchRun>>();
  private readonly retainedRuns: number;
  private readonly fetchFn: typeof fetch;
  private readonly courtHost: string;

  constructor(private readonly deps: CaseSearchServiceDeps<S>) {
    this.orchestrator = deps.orchestrator;
    this.store = deps.store;
    this.retainedRuns = deps.retainedRuns ?? 500;
    this.fetchFn = deps.fetch ?? fetch;
    this.courtHost = new URL(deps.courtBaseUrl).host;

    this.orchestrator.on('search:state', ({ attemptId, state }) => {
      const run = this.runs.get(attemptId);
      if (run) run.state = state;
    });
    this.orchestrator.on('search:challenge', (challenge) => {
      const run = this.runs.get(challenge.attemptId);
      if (run) run.challenge = challenge;
    });
    this.orchestrator.exchange.on('challenge:answered', ({ attemptId }) => this.clearChallenge(attemptId));
    this.orchestrator.exchange.on('challenge:cleared', ({ attemptId }) => this.clearChallenge(attemptId));
  }

  get activeCount(): number {
    return this.completions.size;
  }

  // ============================================
  // Searches
  // ============================================

  /**
   * Starts a search and returns at once. The run can be polled with
   * `status` and finishes on its own.
   */
  start(query: CaseQuery): SearchRun {
    if (this.completions.size >= this.deps.maxConcurrent) {
      throw new ServiceBusyError(this.deps.maxConcurrent);
    }

    const run: SearchRun = {
      attemptId: randomUUID(),
      status: 'running',
      state: 'init',
      startedAt: new Date(),
      finishedAt: null,
      challenge: null,
      caseId: null,
      record: null,
      failure: null,
    };
    this.runs.set(run.attemptId, run);

    const completion = this.orchestrator
      .search(query, { attemptId: run.attemptId })
      .then((result) => this.finish(run, result))
      .finally(() => this.completions.delete(run.attemptId));
    this.completions.set(run.attemptId, completion);

    logger.info('Search queued', { attemptId: run.attemptId, active: this.completions.size });
    return { ...run };
  }

  /** Starts a search and resolves once it has finished */
  async searchAndWait(query: CaseQuery): Promise<SearchRun> {
    const { attemptId } = this.start(query);
    const run = await this.waitFor(attemptId);
    if (!run) throw new Error(`Search ${attemptId} vanished`);
    return run;
  }

  /** Resolves with the finished run; null for runs this process does not know */
  async waitFor(attemptId: string): Promise<SearchRun | null> {
    const completion = this.completions.get(attemptId);
    if (completion) return completion;
    return this.status(attemptId);
  }

  status(attemptId: string): SearchRun | null {
    const run = this.runs.get(attemptId);
    return run ? { ...run } : null;
  }

  challenge(attemptId: string): PendingChallenge | null {
    return this.orchestrator.exchange.getPending(attemptId);
  }

  answerChallenge(attemptId: string, code: string, challengeId?: string): ChallengeAnswer {
    const pending = this.orchestrator.exchange.getPending(attemptId);
    if (!pending) return 'not_pending';
    if (challengeId && challengeId !== pending.challengeId) return 'stale';
    return this.orchestrator.exchange.supply(attemptId, code, challengeId) ? 'accepted' : 'not_pending';
  }

  cancel(attemptId: string): boolean {
    return this.orchestrator.cancel(attemptId);
  }

  /** Cancels what is still running and waits for every run to be logged */
  async shutdown(): Promise<void> {
    for (const attemptId of this.completions.keys()) {
      this.orchestrator.cancel(attemptId);
    }
    await Promise.allSettled([...this.completions.values()]);
    this.orchestrator.exchange.close();
  }

  // ============================================
  // Catalogue, statistics, health
  // ============================================

  catalogue(now: Date = new Date()): { caseTypes: readonly string[]; years: number[] } {
    return { caseTypes: getCaseTypes(), years: getCaseYears(now) };
  }

  getStatistics(): Promise<SearchStatistics> {
    return this.store.getStatistics();
  }

  history(filter: HistoryFilter, pagination: Pagination): Promise<HistoryPage> {
    return this.store.listHistory(filter, pagination);
  }

  getCase(caseId: string): Promise<CaseDetail | null> {
    return this.store.getCase(caseId);
  }

  findCase(caseType: string, caseNumber: string, year: number): Promise<CaseDetail | null> {
    return this.store.findCase(caseType, caseNumber, year);
  }

  async health(): Promise<HealthReport> {
    const [database, browser] = await Promise.all([this.store.ping(), this.deps.probeBrowser()]);
    return {
      status: database && browser.ok ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      database: database ? 'connected' : 'disconnected',
      browser: browser.ok ? 'available' : 'unavailable',
      activeSearches: this.completions.size,
      version: SERVICE_VERSION,
    };
  }

  // ============================================
  // Order PDFs
  // ============================================

  /**
   * Downloads an order PDF from the court website. Other hosts are refused.
   */
  async downloadOrderPdf(url: string): Promise<OrderPdf> {
    let target: URL;
    try {
      target = new URL(url);
    } catch (error) {
      throw new PdfDownloadError(400, 'Invalid PDF URL', { cause: error });
    }
    this.assertCourtUrl(target);

    const deadline = AbortSignal.timeout(this.deps.pdfTimeoutMs);
    let response: Response;
    for (let hop = 0; ; hop++) {
      try {
        response = await this.fetchFn(target, { redirect: 'manual', signal: deadline });
      } catch (error) {
        logger.warn('PDF download failed', { url: target.href, error: error instanceof Error ? error.message : String(error) });
        throw new PdfDownloadError(502, 'The court website did not deliver the PDF', { cause: error });
      }

      const location = response.headers.get('location');
      if (response.status < 300 || response.status >= 400 || !location) break;
      if (hop >= MAX_PDF_REDIRECTS) {
        throw new PdfDownloadError(502, 'The court website redirected too many times');
      }
      await response.body?.cancel();
      try {
        target = new URL(location, target);
      } catch (error) {
        throw new PdfDownloadError(502, 'The court website sent an invalid redirect', { cause: error });
      }
      // every hop has to stay on the court host
      this.assertCourtUrl(target);
    }

    if (!response.ok) {
      throw new PdfDownloadError(502, `The court website answered ${response.status}`);
    }

    const body = Buffer.from(await response.arrayBuffer());
    return {
      body,
      contentType: response.headers.get('content-type') ?? 'application/pdf',
      filename: pdfFilename(target),
    };
  }

  // ============================================
  // Internals
  // ============================================

  private assertCourtUrl(url: URL): void {
    if ((url.protocol !== 'https:' && url.protocol !== 'http:') || url.host !== this.courtHost) {
      throw new PdfDownloadError(400, 'PDFs can only be downloaded from the court website');
    }
  }

  private finish(run: SearchRun, result: SearchResult): SearchRun {
    run.finishedAt = new Date();
    run.challenge = null;
    if (result.success) {
      run.status = 'succeeded';
      run.caseId = result.caseId;
      run.record = result.record;
    } else {
      run.status = 'failed';
      run.failure = result.failure;
    }
    this.pruneRuns();
    return { ...run };
  }

  private clearChallenge(attemptId: string): void {
    const run = this.runs.get(attemptId);
    if (run) run.challenge = null;
  }

  /** Drops the oldest finished runs beyond the retention limit */
  private pruneRuns(): void {
    const finished = [...this.runs.values()].filter((run) => run.status !== 'running');
    const excess = finished.length - this.retainedRuns;
    if (excess <= 0) return;
    finished
      .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime())
      .slice(0, excess)
      .forEach((run) => this.runs.delete(run.attemptId));
  }
}

function pdfFilename(url: URL): string {
  const last = url.pathname.split('/').filter(Boolean).pop() ?? '';
  const safe = last.replace(/[^\w.-]/g, '_');
  if (safe.toLowerCase().endsWith('.pdf')) return safe;
  const stamp = new Date().toISOString().replace(/\D/g, '').slice(0, 14);
  return `court_order_${stamp}.pdf`;
}
