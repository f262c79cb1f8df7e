/**
 * CAPTCHA handling on the search form
 *
 * Reads the challenge shown next to the form, types a supplied code and
 * reports how the site answered. Solving is always left to a person.
 */

import type { Locator, Page } from 'playwright';
import type {
  ChallengeArtifact,
  ChallengeOutcome,
  ChallengeResolver,
  ChallengeSelectors,
  SearchLogger,
} from '../types/index.js';
import { HIGHCOURT_CHALLENGE_SELECTORS } from '../highcourt/selectors.js';
import { createConsoleLogger } from './logger.js';
import type { BrowserSession } from './session-manager.js';

export interface ChallengeResolverConfig {
  selectors?: Partial<ChallengeSelectors>;
  /** Seconds the site keeps a challenge valid */
  expiresIn?: number;
  /** Wait after clicking the refresh control (ms) */
  refreshDelay?: number;
  logger?: SearchLogger;
}

const EXPIRED = /(?:captcha|session).{0,20}expired|session\s+timed\s+out/i;
const REJECTED = /captcha.{0,20}(?:mismatch|invalid|incorrect|wrong|does\s+not\s+match|not\s+matched)|(?:invalid|incorrect|wrong)\s+(?:security\s+code|captcha)/i;

/**
 * Reads the page returned after a code was submitted.
 */
export function classifyChallengeResponse(html: string): ChallengeOutcome {
  const text = html.replace(/<[^>]+>/g, ' ').replace(/\s+/g, ' ');
  if (EXPIRED.test(text)) return 'expired';
  if (REJECTED.test(text)) return 'rejected';
  return 'accepted';
}

export class PageChallengeResolver implements ChallengeResolver<BrowserSession> {
  private readonly selectors: ChallengeSelectors;
  private readonly expiresIn: number;
  private readonly refreshDelay: number;
  private readonly logger: SearchLogger;

  constructor(config: ChallengeResolverConfig = {}) {
    this.selectors = { ...HIGHCOURT_CHALLENGE_SELECTORS, ...config.selectors };
    this.expiresIn = config.expiresIn ?? 300;
    this.refreshDelay = config.refreshDelay ?? 1000;
    this.logger = config.logger ?? createConsoleLogger('challenge');
  }

  async extractChallenge(session: BrowserSession): Promise<ChallengeArtifact | null> {
    const { page } = session;

    const input = page.locator(this.selectors.input).first();
    if (!(await isVisible(input))) return null;

    const base = { pageUrl: page.url(), detectedAt: new Date(), expiresIn: this.expiresIn };

    const image = page.locator(this.selectors.image).first();
    if (await isVisible(image)) {
      const imageBase64 = await this.captureImageAsBase64(image);
      if (imageBase64) {
        this.logger.info('Image challenge detected', { pageUrl: base.pageUrl });
        return { kind: 'image', imageBase64, ...base };
      }
    }

    const textEl = page.locator(this.selectors.text).first();
    if (await isVisible(textEl)) {
      const text = ((await textEl.textContent()) ?? '').trim();
      if (text) {
        this.logger.info('Text challenge detected', { pageUrl: base.pageUrl });
        return { kind: 'text', text, ...base };
      }
    }

    // an input without a readable challenge still needs a person looking at the page
    const screenshot = await page.screenshot({ fullPage: false });
    this.logger.warn('Challenge input found but challenge unreadable, sending page screenshot');
    return { kind: 'image', imageBase64: screenshot.toString('base64'), ...base };
  }

  async submitResponse(session: BrowserSession, code: string): Promise<ChallengeOutcome> {
    const { page } = session;
    await page.locator(this.selectors.input).first().fill(code);
    await page.locator(this.selectors.submitBtn).first().click();
    await settle(page);

    const outcome = classifyChallengeResponse(await page.content());
    this.logger.info('Challenge answered', { outcome });
    return outcome;
  }

  async refresh(session: BrowserSession): Promise<ChallengeArtifact | null> {
    const { page } = session;
    const button = page.locator(this.selectors.refreshBtn).first();

    if (await isVisible(button)) {
      await button.click();
      await page.waitForTimeout(this.refreshDelay);
    }
    return this.extractChallenge(session);
  }

  private async captureImageAsBase64(image: Locator): Promise<string> {
    const src = await image.getAttribute('src');
    if (src?.startsWith('data:image')) {
      return src.split(',')[1] ?? '';
    }
    const buffer = await image.screenshot();
    return buffer.toString('base64');
  }
}

async function isVisible(locator: Locator): Promise<boolean> {
  return (await locator.count()) > 0 && (await locator.isVisible());
}

async function settle(page: Page): Promise<void> {
  await page.waitForLoadState('domcontentloaded');
  await page.waitForLoadState('networkidle', { timeout: 10000 }).catch(() => undefined);
}
