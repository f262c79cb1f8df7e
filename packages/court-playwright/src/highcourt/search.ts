/**
 * Wires the Playwright implementations into a SearchOrchestrator
 */

import type { SearchConfig, SearchLogger, SearchStore, SessionConfig } from '../types/index.js';
import { ChallengeExchange } from '../core/challenge-exchange.js';
import { PageChallengeResolver } from '../core/challenge-resolver.js';
import { SearchOrchestrator } from '../core/orchestrator.js';
import { SessionManager, type BrowserSession } from '../core/session-manager.js';
import type { ValidationOptions } from '../core/validation.js';
import { HighCourtResultParser } from '../parser/result-parser.js';
import { HighCourtPortal } from './portal.js';

export interface HighCourtSearchOptions {
  store: SearchStore;
  /** URL of the case-status form */
  searchUrl?: string;
  session?: SessionConfig;
  search?: SearchConfig;
  validation?: ValidationOptions;
  exchange?: ChallengeExchange;
  logger?: SearchLogger;
}

export interface HighCourtSearch {
  orchestrator: SearchOrchestrator<BrowserSession>;
  sessions: SessionManager;
  exchange: ChallengeExchange;
}

export function createHighCourtSearch(options: HighCourtSearchOptions): HighCourtSearch {
  const { logger } = options;
  const sessions = new SessionManager(options.session, logger);
  const portal = new HighCourtPortal(sessions, { searchUrl: options.searchUrl, logger });
  const exchange = options.exchange ?? new ChallengeExchange();

  const orchestrator = new SearchOrchestrator<BrowserSession>({
    sessions,
    portal,
    challenges: new PageChallengeResolver({ logger }),
    parser: new HighCourtResultParser({ baseUrl: portal.searchUrl, logger }),
    store: options.store,
    exchange,
    config: options.search,
    validation: options.validation,
    logger,
  });

  return { orchestrator, sessions, exchange };
}
