/**
 * court-playwright
 *
 * Case-status search for the High Court website: form automation,
 * human-in-the-loop CAPTCHA, result parsing and persistence contracts
 */

// Core
export { SearchOrchestrator, outcomeFor, type SearchOrchestratorDeps, type SearchOptions } from './core/orchestrator.js';
export { ChallengeExchange } from './core/challenge-exchange.js';
export { MemorySearchStore, dedupeOrders, orderIdentity, clampPagination, HISTORY_DEFAULT_LIMIT, HISTORY_MAX_LIMIT } from './core/memory-store.js';
export { PageChallengeResolver, classifyChallengeResponse, type ChallengeResolverConfig } from './core/challenge-resolver.js';
export { SessionManager, type BrowserSession, type ProbeResult } from './core/session-manager.js';
export { validateQuery, type ValidationOptions } from './core/validation.js';
export { createConsoleLogger, silentLogger } from './core/logger.js';
export {
  SEARCH_DEFAULTS,
  resolveSearchConfig,
  classifyError,
  backoffDelay,
  sleep,
  raceAbort,
  failFast,
  withRetry,
  type RetryOptions,
} from './core/resilience.js';
export {
  SearchError,
  ValidationError,
  NavigationError,
  SiteUnreachableError,
  ChallengeTimeoutError,
  ChallengeExhaustedError,
  ParseError,
  CaseNotFoundError,
  StorageError,
  CancelledError,
  AttemptTimeoutError,
  toSearchError,
  toSearchFailure,
  describeCause,
} from './core/errors.js';

// Parser
export { HighCourtResultParser, createResultParser, type ResultParserOptions } from './parser/result-parser.js';
export { parseLenientDate } from './parser/dates.js';

// High Court
export {
  DEFAULT_COURT_URL,
  FIRST_CASE_YEAR,
  getCaseTypes,
  getCaseYears,
  isKnownCaseType,
  normalizeCaseType,
  normalizeCaseNumber,
  caseKey,
} from './highcourt/catalogue.js';
export { HighCourtPortal, type HighCourtPortalConfig } from './highcourt/portal.js';
export { HIGHCOURT_URLS, HIGHCOURT_FORM_SELECTORS, HIGHCOURT_CHALLENGE_SELECTORS } from './highcourt/selectors.js';
export { createHighCourtSearch, type HighCourtSearch, type HighCourtSearchOptions } from './highcourt/search.js';

// Types
export type {
  // Query & record
  CaseQuery,
  CaseRecord,
  CaseField,
  OrderEntry,
  OrderKind,
  PageKind,

  // Challenge
  ChallengeArtifact,
  ChallengeOutcome,
  ChallengeEvents,
  PendingChallenge,

  // Orchestration
  SearchState,
  FailureKind,
  SearchFailure,
  SearchResult,
  SearchConfig,
  SessionConfig,
  SearchEvents,

  // Collaborators
  ResultPage,
  SessionDriver,
  SearchPortal,
  ChallengeResolver,
  CaseResultParser,

  // Persistence
  AttemptOutcome,
  SearchAttempt,
  AttemptResult,
  StoredCase,
  StoredOrder,
  CaseDetail,
  UpsertResult,
  HistoryFilter,
  Pagination,
  HistoryPage,
  SearchStore,

  // Logging
  SearchLogger,

  // Selectors
  SemanticSelector,
  SearchFormSelectors,
  ChallengeSelectors,
} from './types/index.js';
