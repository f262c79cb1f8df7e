/**
 * Types of the court-fetcher service
 */

import type {
  CaseRecord,
  PendingChallenge,
  SearchFailure,
  SearchState,
} from 'court-playwright';

// ============================================
// Search runs
// ============================================

export type RunStatus = 'running' | 'succeeded' | 'failed';

/** What the service knows about one search attempt it started */
export interface SearchRun {
  attemptId: string;
  status: RunStatus;
  state: SearchState;
  startedAt: Date;
  finishedAt: Date | null;
  challenge: PendingChallenge | null;
  caseId: string | null;
  record: CaseRecord | null;
  failure: SearchFailure | null;
}

// ============================================
// Statistics & health
// ============================================

export interface CaseTypeCount {
  caseType: string;
  count: number;
}

export interface SearchStatistics {
  totalSearches: number;
  successfulSearches: number;
  /** Percentage, 0 when nothing was searched yet */
  successRate: number;
  /** Searches submitted in the last 24 hours */
  recentSearches: number;
  popularCaseTypes: CaseTypeCount[];
  storedCases: number;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  database: 'connected' | 'disconnected';
  browser: 'available' | 'unavailable';
  activeSearches: number;
  version: string;
}
