/**
 * Browser session manager
 *
 * One BrowserSession per search attempt. The session is the only place
 * that holds cookies and page state of the court website.
 */

import { randomUUID } from 'crypto';
import { chromium, type Browser, type BrowserContext, type LaunchOptions, type Page } from 'playwright';
import type { SearchLogger, SessionConfig, SessionDriver } from '../types/index.js';
import { NavigationError } from './errors.js';
import { createConsoleLogger } from './logger.js';
import { failFast } from './resilience.js';

export interface BrowserSession {
  id: string;
  browser: Browser;
  context: BrowserContext;
  page: Page;
  openedAt: Date;
}

export interface ProbeResult {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export class SessionManager implements SessionDriver<BrowserSession> {
  private readonly config: Required<Omit<SessionConfig, 'slowMo'>> & { slowMo?: number };
  private readonly logger: SearchLogger;
  private readonly activeSessions = new Set<string>();

  constructor(config: SessionConfig = {}, logger?: SearchLogger) {
    this.config = {
      headless: config.headless ?? true,
      navigationTimeout: config.navigationTimeout ?? 30000,
      slowMo: config.slowMo,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      probeTimeout: config.probeTimeout ?? 15000,
    };
    this.logger = logger ?? createConsoleLogger('session');
  }

  /** Sessions opened and not yet closed */
  get activeCount(): number {
    return this.activeSessions.size;
  }

  // ============================================
  // Lifecycle
  // ============================================

  async open(): Promise<BrowserSession> {
    const launchOpts: LaunchOptions = {
      headless: this.config.headless,
      slowMo: this.config.slowMo,
      args: ['--no-sandbox', '--disable-dev-shm-usage'],
    };
    const browser = await chromium.launch(launchOpts);

    try {
      const context = await browser.newContext({ userAgent: this.config.userAgent });
      const page = await context.newPage();
      page.setDefaultTimeout(this.config.navigationTimeout);
      page.setDefaultNavigationTimeout(this.config.navigationTimeout);

      const session: BrowserSession = { id: randomUUID(), browser, context, page, openedAt: new Date() };
      this.activeSessions.add(session.id);
      this.logger.debug('Session opened', { sessionId: session.id });
      return session;
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  /** Never throws: teardown problems are logged */
  async close(session: BrowserSession): Promise<void> {
    this.activeSessions.delete(session.id);
    try {
      await session.context.close();
    } catch (error) {
      this.logger.warn('Failed to close browser context', { sessionId: session.id, error: String(error) });
    }
    try {
      await session.browser.close();
    } catch (error) {
      this.logger.warn('Failed to close browser', { sessionId: session.id, error: String(error) });
    }
    this.logger.debug('Session closed', { sessionId: session.id });
  }

  async withSession<T>(fn: (session: BrowserSession) => Promise<T>): Promise<T> {
    const session = await this.open();
    try {
      return await fn(session);
    } finally {
      await this.close(session);
    }
  }

  // ============================================
  // Navigation
  // ============================================

  /**
   * Loads `url` in the session page. Transport failures, timeouts and
   * 5xx answers become NavigationError.
   */
  async navigate(session: BrowserSession, url: string): Promise<void> {
    let status: number | undefined;
    try {
      const response = await session.page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.config.navigationTimeout,
      });
      status = response?.status();
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new NavigationError(url, `Navigation to ${url} failed: ${msg}`, { cause: error });
    }

    if (status !== undefined && status >= 500) {
      throw new NavigationError(url, `Navigation to ${url} answered HTTP ${status}`);
    }
  }

  // ============================================
  // Health
  // ============================================

  /** Whether a browser can be launched right now */
  async probe(): Promise<ProbeResult> {
    const start = Date.now();
    try {
      await failFast(async () => {
        const browser = await chromium.launch({ headless: true });
        await browser.close();
      }, this.config.probeTimeout);
      return { ok: true, latencyMs: Date.now() - start };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      this.logger.warn('Browser probe failed', { error: msg });
      return { ok: false, latencyMs: Date.now() - start, error: msg };
    }
  }
}
