/**
 * High Court case-status portal
 *
 * Drives the search form of the court website through semantic
 * selectors: ARIA role first, CSS fallback second.
 */

import type { Locator, Page } from 'playwright';
import type {
  CaseQuery,
  ResultPage,
  SearchFormSelectors,
  SearchLogger,
  SearchPortal,
  SemanticSelector,
} from '../types/index.js';
import type { BrowserSession, SessionManager } from '../core/session-manager.js';
import { createConsoleLogger } from '../core/logger.js';
import { failFast } from '../core/resilience.js';
import { HIGHCOURT_FORM_SELECTORS, HIGHCOURT_URLS } from './selectors.js';

export interface HighCourtPortalConfig {
  /** URL of the case-status form */
  searchUrl?: string;
  /** Budget of each selector lookup (ms) */
  selectorTimeout?: number;
  selectors?: Partial<SearchFormSelectors>;
  logger?: SearchLogger;
}

type AriaRole = Parameters<Page['getByRole']>[0];

export class HighCourtPortal implements SearchPortal<BrowserSession> {
  readonly searchUrl: string;
  private readonly sessions: SessionManager;
  private readonly selectors: SearchFormSelectors;
  private readonly selectorTimeout: number;
  private readonly logger: SearchLogger;

  constructor(sessions: SessionManager, config: HighCourtPortalConfig = {}) {
    this.sessions = sessions;
    this.searchUrl = config.searchUrl ?? HIGHCOURT_URLS.caseStatus;
    this.selectors = { ...HIGHCOURT_FORM_SELECTORS, ...config.selectors };
    this.selectorTimeout = config.selectorTimeout ?? 5000;
    this.logger = config.logger ?? createConsoleLogger('highcourt');
  }

  async openSearchForm(session: BrowserSession): Promise<void> {
    await this.sessions.navigate(session, this.searchUrl);
    await this.waitForLoad(session.page);
  }

  async fillSearchForm(session: BrowserSession, query: CaseQuery): Promise<void> {
    const { page } = session;
    await this.selectSmart(page, this.selectors.caseTypeSelect, query.caseType);
    await this.fillSmart(page, this.selectors.caseNumberInput, query.caseNumber);
    await this.selectSmart(page, this.selectors.yearSelect, String(query.year));
    this.logger.debug('Search form filled', { caseType: query.caseType, caseNumber: query.caseNumber, year: query.year });
  }

  async submitSearch(session: BrowserSession): Promise<void> {
    await this.clickSmart(session.page, this.selectors.submitBtn);
    await this.waitForLoad(session.page);
  }

  async readResultPage(session: BrowserSession): Promise<ResultPage> {
    await this.waitForLoad(session.page);
    return { html: await session.page.content(), url: session.page.url() };
  }

  // ============================================
  // Semantic selector helpers
  // ============================================

  private describe(selector: SemanticSelector): string {
    const name = selector.name instanceof RegExp ? selector.name.source : (selector.name ?? '');
    return `${selector.role} "${name}"`;
  }

  private ariaLocator(page: Page, selector: SemanticSelector): Locator {
    const role: AriaRole = selector.role;
    return page.getByRole(role, { name: selector.name }).first();
  }

  /** Runs `action` against the ARIA locator, then against the CSS fallback */
  private async cascade(
    page: Page,
    selector: SemanticSelector,
    action: (locator: Locator) => Promise<unknown>,
  ): Promise<void> {
    const t = this.selectorTimeout;

    try {
      await failFast(() => action(this.ariaLocator(page, selector)), t);
      return;
    } catch (error) {
      this.logger.debug('ARIA lookup failed, trying CSS fallback', {
        selector: this.describe(selector),
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (!selector.fallback) {
      throw new Error(`Element not found: ${this.describe(selector)}`);
    }
    await failFast(() => action(page.locator(selector.fallback ?? '').first()), t);
  }

  private async fillSmart(page: Page, selector: SemanticSelector, value: string): Promise<void> {
    await this.cascade(page, selector, (locator) => locator.fill(value));
  }

  private async clickSmart(page: Page, selector: SemanticSelector): Promise<void> {
    await this.cascade(page, selector, (locator) => locator.click());
  }

  /** Options are matched by visible label, then by value */
  private async selectSmart(page: Page, selector: SemanticSelector, option: string): Promise<void> {
    await this.cascade(page, selector, async (locator) => {
      try {
        await locator.selectOption({ label: option }, { timeout: this.selectorTimeout });
      } catch (error) {
        this.logger.debug('Option label not found, matching by value', { option, error: String(error) });
        await locator.selectOption({ value: option }, { timeout: this.selectorTimeout });
      }
    });
  }

  private async waitForLoad(page: Page): Promise<void> {
    try {
      await page.waitForLoadState('networkidle', { timeout: this.selectorTimeout * 2 });
    } catch (error) {
      // pages with long-polling scripts never go idle
      this.logger.debug('Network did not settle', { error: error instanceof Error ? error.message : String(error) });
    }
  }
}
