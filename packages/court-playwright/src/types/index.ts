/**
 * Core types of court-playwright
 */

// ============================================
// Query
// ============================================

export interface CaseQuery {
  /** Case type exactly as listed by the court (e.g. "W.P.(C)") */
  caseType: string;
  /** Case number, digits only */
  caseNumber: string;
  year: number;
  /** Code for the first challenge, when the caller already has one */
  captchaCode?: string | null;
}

// ============================================
// Extracted record
// ============================================

export type OrderKind = 'order' | 'judgment';

export interface OrderEntry {
  /** ISO date (YYYY-MM-DD), null when unknown */
  date: string | null;
  description: string;
  /** Absolute URL of the PDF, null when unavailable */
  pdfUrl: string | null;
  kind: OrderKind;
}

/**
 * Normalized case record. Every nullable field uses `null` for "unknown".
 */
export interface CaseRecord {
  caseType: string;
  caseNumber: string;
  year: number;
  title: string | null;
  petitioner: string | null;
  respondent: string | null;
  filingDate: string | null;
  nextHearingDate: string | null;
  status: string | null;
  bench: string | null;
  orders: OrderEntry[];
}

export type CaseField = 'title' | 'petitioner' | 'respondent' | 'filingDate' | 'nextHearingDate' | 'status' | 'bench';

/** How a page reads: a result, a "no record" answer, an error page, or still the form/loading */
export type PageKind = 'result' | 'not_found' | 'error' | 'pending';

// ============================================
// Challenge (human-in-the-loop)
// ============================================

export type ChallengeArtifact =
  | {
    kind: 'image';
    /** PNG/JPEG bytes in base64 */
    imageBase64: string;
    pageUrl: string;
    detectedAt: Date;
    /** Seconds before the site discards the challenge */
    expiresIn: number;
  }
  | {
    kind: 'text';
    /** Code rendered as plain text in the page */
    text: string;
    pageUrl: string;
    detectedAt: Date;
    expiresIn: number;
  };

export type ChallengeOutcome = 'accepted' | 'rejected' | 'expired';

export interface ChallengeEvents {
  'challenge:pending': [PendingChallenge];
  'challenge:answered': [{ attemptId: string; challengeId: string }];
  'challenge:cleared': [{ attemptId: string; challengeId: string; reason: 'timeout' | 'cancelled' }];
}

export interface PendingChallenge {
  attemptId: string;
  /** Identifies the artifact; answers for a superseded artifact are refused */
  challengeId: string;
  artifact: ChallengeArtifact;
  expiresAt: Date;
}

// ============================================
// Orchestration
// ============================================

export type SearchState =
  | 'init'
  | 'form_filled'
  | 'submitted'
  | 'challenge_pending'
  | 'challenge_resolved'
  | 'result_ready'
  | 'success'
  | 'failed';

export type FailureKind =
  | 'ValidationError'
  | 'SiteUnreachable'
  | 'ChallengeTimeout'
  | 'ChallengeExhausted'
  | 'ParseError'
  | 'StorageError'
  | 'Cancelled'
  | 'CaseNotFound'
  | 'AttemptTimeout';

export interface SearchFailure {
  kind: FailureKind;
  message: string;
}

export type SearchResult =
  | { success: true; attemptId: string; caseId: string; record: CaseRecord }
  | { success: false; attemptId: string; failure: SearchFailure };

export interface SearchConfig {
  /** Challenge submissions allowed before ChallengeExhausted */
  maxChallengeAttempts?: number;
  /** How long to wait for a human-supplied code (ms) */
  challengeWaitMs?: number;
  /** Extra tries for a failed navigation/submission */
  navigationRetries?: number;
  /** Reads of the result page before giving up */
  resultPollAttempts?: number;
  /** Base delay of the exponential backoff (ms) */
  retryBackoffMs?: number;
  /** Wall-clock budget of a whole attempt (ms) */
  attemptTimeoutMs?: number;
}

export interface SessionConfig {
  headless?: boolean;
  /** Page-load timeout (ms) */
  navigationTimeout?: number;
  /** Delay between actions (ms) - useful for debugging */
  slowMo?: number;
  userAgent?: string;
  /** Upper bound for the liveness probe (ms) */
  probeTimeout?: number;
}

/** Event name -> listener arguments */
export interface SearchEvents {
  'search:state': [{ attemptId: string; state: SearchState }];
  'search:challenge': [PendingChallenge];
  'search:success': [{ attemptId: string; caseId: string; record: CaseRecord }];
  'search:failed': [{ attemptId: string; failure: SearchFailure }];
}

// ============================================
// Collaborators
// ============================================

export interface ResultPage {
  html: string;
  /** URL the page was read from; relative links resolve against it */
  url: string;
}

/**
 * Owns the browsing backend. `S` is the opaque session handle passed to
 * every other collaborator; nothing else holds session state.
 */
export interface SessionDriver<S> {
  open(): Promise<S>;
  close(session: S): Promise<void>;
}

export interface SearchPortal<S> {
  /** Loads the search form; throws NavigationError when the page does not load */
  openSearchForm(session: S): Promise<void>;
  fillSearchForm(session: S, query: CaseQuery): Promise<void>;
  /** Submits the form when no challenge guards it */
  submitSearch(session: S): Promise<void>;
  readResultPage(session: S): Promise<ResultPage>;
}

export interface ChallengeResolver<S> {
  /** Returns the challenge shown on the form, or null when there is none */
  extractChallenge(session: S): Promise<ChallengeArtifact | null>;
  /** Types the code, submits the form and reports how the site answered */
  submitResponse(session: S, code: string): Promise<ChallengeOutcome>;
  /** Asks the site for a fresh challenge on an already loaded form */
  refresh(session: S): Promise<ChallengeArtifact | null>;
}

export interface CaseResultParser {
  detectPage(html: string): PageKind;
  /** Throws ParseError or CaseNotFoundError when the page is not a result */
  parse(page: ResultPage, query: CaseQuery): CaseRecord;
}

// ============================================
// Persistence
// ============================================

export type AttemptOutcome = 'pending' | 'success' | 'failure' | 'captcha_required' | 'timeout';

export interface SearchAttempt {
  id: string;
  caseType: string;
  caseNumber: string;
  /** null when the request carried no usable year */
  year: number | null;
  submittedAt: Date;
  outcome: AttemptOutcome;
  errorKind: FailureKind | null;
  errorDetail: string | null;
  completedAt: Date | null;
  /** Case written by this attempt, if any */
  caseId: string | null;
}

export type AttemptResult =
  | { outcome: 'success'; caseId: string }
  | { outcome: Exclude<AttemptOutcome, 'pending' | 'success'>; errorKind: FailureKind; errorDetail: string };

export interface StoredCase {
  id: string;
  caseType: string;
  caseNumber: string;
  year: number;
  title: string | null;
  petitioner: string | null;
  respondent: string | null;
  filingDate: string | null;
  nextHearingDate: string | null;
  status: string | null;
  bench: string | null;
  /** Incremented on every successful re-fetch */
  version: number;
  firstFetchedAt: Date;
  lastFetchedAt: Date;
}

export interface StoredOrder {
  id: number;
  caseId: string;
  orderDate: string | null;
  description: string;
  pdfLocation: string | null;
  kind: OrderKind;
  position: number;
}

export interface CaseDetail {
  case: StoredCase;
  orders: StoredOrder[];
}

export interface UpsertResult {
  caseId: string;
  created: boolean;
  ordersInserted: number;
  ordersUpdated: number;
}

export interface HistoryFilter {
  caseType?: string;
  caseNumber?: string;
  year?: number;
  outcome?: AttemptOutcome;
  since?: Date;
}

export interface Pagination {
  limit?: number;
  offset?: number;
}

export interface HistoryPage {
  items: SearchAttempt[];
  total: number;
  limit: number;
  offset: number;
}

/**
 * Storage contract used by the orchestrator. The orchestrator never
 * touches storage any other way.
 */
export interface SearchStore {
  logAttempt(attempt: SearchAttempt): Promise<void>;
  recordOutcome(attemptId: string, result: AttemptResult): Promise<SearchAttempt>;
  upsertCase(record: CaseRecord): Promise<UpsertResult>;
  getCase(caseId: string): Promise<CaseDetail | null>;
  listHistory(filter?: HistoryFilter, pagination?: Pagination): Promise<HistoryPage>;
}

// ============================================
// Logging
// ============================================

export interface SearchLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

// ============================================
// Semantic selectors (ARIA)
// ============================================

export interface SemanticSelector {
  role: 'button' | 'textbox' | 'link' | 'combobox' | 'img' | 'table';
  name?: RegExp | string;
  fallback?: string;
}

export interface SearchFormSelectors {
  caseTypeSelect: SemanticSelector;
  caseNumberInput: SemanticSelector;
  yearSelect: SemanticSelector;
  submitBtn: SemanticSelector;
}

export interface ChallengeSelectors {
  /** Challenge image */
  image: string;
  /** Code rendered as text */
  text: string;
  /** Answer input */
  input: string;
  /** Refresh control */
  refreshBtn: string;
  /** Submit control used after typing the answer */
  submitBtn: string;
}
