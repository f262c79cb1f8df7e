/**
 * Orchestrator tests
 *
 * The browser side is faked; parsing and storage are the real ones.
 */

import { describe, it, expect } from 'vitest';
import { SearchOrchestrator, outcomeFor } from '../src/core/orchestrator.js';
import { MemorySearchStore } from '../src/core/memory-store.js';
import { HighCourtResultParser } from '../src/parser/result-parser.js';
import { StorageError } from '../src/core/errors.js';
import { silentLogger } from '../src/core/logger.js';
import type { CaseQuery, CaseRecord, SearchConfig, SearchState, UpsertResult } from '../src/types/index.js';
import {
  FakeChallengeResolver,
  FakePortal,
  FakeSessionDriver,
  fixture,
  type FakeChallengeScript,
  type FakePortalScript,
} from './support/fakes.js';

const FAST: SearchConfig = {
  maxChallengeAttempts: 3,
  challengeWaitMs: 5000,
  navigationRetries: 2,
  resultPollAttempts: 3,
  retryBackoffMs: 0,
  attemptTimeoutMs: 10000,
};

const query: CaseQuery = { caseType: 'W.P.(C)', caseNumber: '1234', year: 2023, captchaCode: 'AB12' };

interface Setup {
  portal?: FakePortalScript;
  challenges?: FakeChallengeScript;
  config?: SearchConfig;
  store?: MemorySearchStore;
  driver?: FakeSessionDriver;
}

function setup(options: Setup = {}) {
  const driver = options.driver ?? new FakeSessionDriver();
  const portal = new FakePortal(options.portal);
  const challenges = new FakeChallengeResolver(options.challenges);
  const store = options.store ?? new MemorySearchStore();
  const orchestrator = new SearchOrchestrator({
    sessions: driver,
    portal,
    challenges,
    parser: new HighCourtResultParser({ logger: silentLogger }),
    store,
    config: { ...FAST, ...options.config },
    logger: silentLogger,
  });
  return { driver, portal, challenges, store, orchestrator };
}

async function onlyAttempt(store: MemorySearchStore) {
  const history = await store.listHistory();
  expect(history.total).toBe(1);
  return history.items[0];
}

describe('SearchOrchestrator', () => {
  describe('success', () => {
    it('should extract, store and report the case', async () => {
      const { orchestrator, store, driver, challenges } = setup();

      const result = await orchestrator.search(query, { attemptId: 'attempt-1' });

      expect(result).toMatchObject({ success: true, attemptId: 'attempt-1', caseId: 'W.P.(C)/1234/2023' });
      if (!result.success) return;
      expect(result.record).toMatchObject({
        caseType: 'W.P.(C)',
        caseNumber: '1234',
        year: 2023,
        petitioner: 'X',
        respondent: 'Y',
        status: 'Pending',
      });
      expect(result.record.orders).toEqual([{
        date: '2023-05-01',
        description: 'Order on application',
        pdfUrl: 'https://court.test/app/showlogo/abc.pdf',
        kind: 'order',
      }]);

      expect(challenges.codes).toEqual(['AB12']);
      expect(driver.opened).toHaveLength(1);
      expect(driver.opened[0]?.closed).toBe(true);

      const attempt = await onlyAttempt(store);
      expect(attempt).toMatchObject({
        id: 'attempt-1',
        outcome: 'success',
        caseId: 'W.P.(C)/1234/2023',
        errorKind: null,
      });
      expect(attempt?.completedAt).toBeInstanceOf(Date);

      const detail = await store.getCase('W.P.(C)/1234/2023');
      expect(detail?.case.version).toBe(1);
      expect(detail?.orders.map((order) => order.orderDate)).toEqual(['2023-05-01']);
    });

    it('should walk every state when the form has no challenge', async () => {
      const { orchestrator, portal } = setup({ challenges: { initial: null } });
      const states: SearchState[] = [];
      orchestrator.on('search:state', ({ state }) => states.push(state));

      const result = await orchestrator.search({ caseType: 'W.P.(C)', caseNumber: '1234', year: 2023 });

      expect(result.success).toBe(true);
      expect(portal.submits).toBe(1);
      expect(states).toEqual([
        'init',
        'form_filled',
        'submitted',
        'challenge_pending',
        'challenge_resolved',
        'result_ready',
        'success',
      ]);
    });

    it('should wait for a code supplied through the exchange', async () => {
      const { orchestrator, challenges } = setup();
      orchestrator.on('search:challenge', (challenge) => {
        orchestrator.exchange.supply(challenge.attemptId, 'K7P2', challenge.challengeId);
      });

      const result = await orchestrator.search({ ...query, captchaCode: null });

      expect(result.success).toBe(true);
      expect(challenges.codes).toEqual(['K7P2']);
    });

    it('should keep reading while the result is still loading', async () => {
      const { orchestrator, portal } = setup({
        portal: { pages: ['', '', fixture('result-table.html')] },
      });

      const result = await orchestrator.search(query);

      expect(result.success).toBe(true);
      expect(portal.reads).toBe(3);
    });

    it('should recover from a transient navigation failure', async () => {
      const { orchestrator, portal } = setup({ portal: { openFailures: 1 } });

      const result = await orchestrator.search(query);

      expect(result.success).toBe(true);
      expect(portal.opens).toBe(2);
    });

    it('should read the result again after a dropped connection', async () => {
      const { orchestrator, portal } = setup({ portal: { readFailures: 1 } });

      const result = await orchestrator.search(query);

      expect(result).toMatchObject({ success: true, caseId: 'W.P.(C)/1234/2023' });
      expect(portal.reads).toBe(2);
    });

    it('should store the case number without leading zeros on the attempt', async () => {
      const { orchestrator, store } = setup();

      await orchestrator.search({ ...query, caseNumber: '001234' });

      expect(await onlyAttempt(store)).toMatchObject({ caseNumber: '1234', outcome: 'success' });
      expect((await store.listHistory({ caseNumber: '1234' })).total).toBe(1);
    });

    it('should bump the version on a re-fetch without duplicating orders', async () => {
      const store = new MemorySearchStore();
      await setup({ store }).orchestrator.search(query);
      const second = await setup({ store }).orchestrator.search(query);

      expect(second.success).toBe(true);
      const detail = await store.getCase('W.P.(C)/1234/2023');
      expect(detail?.case.version).toBe(2);
      expect(detail?.orders).toHaveLength(1);
      expect((await store.listHistory({ outcome: 'success' })).total).toBe(2);
    });
  });

  describe('challenge failures', () => {
    it('should give up after the allowed number of rejected codes', async () => {
      const { orchestrator, challenges, portal, store } = setup({ challenges: { outcomes: ['rejected'] } });
      let next = 2;
      orchestrator.on('search:challenge', (challenge) => {
        orchestrator.exchange.supply(challenge.attemptId, `code-${next++}`);
      });

      const result = await orchestrator.search(query);

      expect(result).toMatchObject({ success: false, failure: { kind: 'ChallengeExhausted' } });
      expect(challenges.codes).toEqual(['AB12', 'code-2', 'code-3']);
      expect(challenges.refreshes).toBe(2);
      expect(portal.opens).toBe(3);
      expect(await onlyAttempt(store)).toMatchObject({ outcome: 'captcha_required', errorKind: 'ChallengeExhausted' });
    });

    it('should accept a later code after a rejection', async () => {
      const { orchestrator, challenges } = setup({ challenges: { outcomes: ['rejected', 'accepted'] } });
      orchestrator.on('search:challenge', (challenge) => {
        expect(challenge.artifact).toMatchObject({ kind: 'text', text: 'ZX90' });
        orchestrator.exchange.supply(challenge.attemptId, 'ZX90');
      });

      const result = await orchestrator.search(query);

      expect(result.success).toBe(true);
      expect(challenges.codes).toEqual(['AB12', 'ZX90']);
    });

    it('should ask for a fresh code after an expired challenge', async () => {
      const { orchestrator, challenges, portal } = setup({ challenges: { outcomes: ['expired', 'accepted'] } });
      const shown: string[] = [];
      orchestrator.on('search:challenge', (challenge) => {
        if (challenge.artifact.kind === 'text') shown.push(challenge.artifact.text);
        orchestrator.exchange.supply(challenge.attemptId, 'ZX90', challenge.challengeId);
      });

      const result = await orchestrator.search(query);

      expect(result.success).toBe(true);
      expect(challenges.refreshes).toBe(1);
      expect(challenges.codes).toEqual(['AB12', 'ZX90']);
      expect(shown).toEqual(['ZX90']);
      expect(portal.opens).toBe(2);
    });

    it('should time out when nobody supplies a code', async () => {
      const { orchestrator, store, driver } = setup({ config: { challengeWaitMs: 20 } });

      const result = await orchestrator.search({ ...query, captchaCode: null });

      expect(result).toMatchObject({ success: false, failure: { kind: 'ChallengeTimeout' } });
      expect(driver.opened[0]?.closed).toBe(true);
      expect(await onlyAttempt(store)).toMatchObject({ outcome: 'timeout', errorKind: 'ChallengeTimeout' });
    });
  });

  describe('cancellation', () => {
    it('should cancel an attempt waiting for a code', async () => {
      const { orchestrator, store, driver } = setup();
      orchestrator.on('search:challenge', (challenge) => {
        expect(orchestrator.activeAttempts).toEqual([challenge.attemptId]);
        orchestrator.cancel(challenge.attemptId);
      });

      const result = await orchestrator.search({ ...query, captchaCode: null }, { attemptId: 'attempt-1' });

      expect(result).toMatchObject({ success: false, failure: { kind: 'Cancelled' } });
      expect(driver.opened[0]?.closed).toBe(true);
      expect(orchestrator.activeAttempts).toEqual([]);
      expect(orchestrator.exchange.listPending()).toEqual([]);
      expect(await onlyAttempt(store)).toMatchObject({ outcome: 'failure', errorKind: 'Cancelled' });
    });

    it('should cancel when the caller aborts its signal', async () => {
      const { orchestrator } = setup();
      const controller = new AbortController();
      orchestrator.on('search:challenge', () => controller.abort());

      const result = await orchestrator.search({ ...query, captchaCode: null }, { signal: controller.signal });

      expect(result).toMatchObject({ success: false, failure: { kind: 'Cancelled' } });
    });

    it('should report false when cancelling an unknown attempt', () => {
      expect(setup().orchestrator.cancel('nope')).toBe(false);
    });

    it('should stop when the attempt runs out of time', async () => {
      const { orchestrator, store } = setup({ config: { attemptTimeoutMs: 30 } });

      const result = await orchestrator.search({ ...query, captchaCode: null });

      expect(result).toMatchObject({ success: false, failure: { kind: 'AttemptTimeout' } });
      expect(await onlyAttempt(store)).toMatchObject({ outcome: 'timeout', errorKind: 'AttemptTimeout' });
    });
  });

  describe('other failures', () => {
    it('should reject an invalid query before opening a browser', async () => {
      const { orchestrator, store, driver } = setup();

      const result = await orchestrator.search({ caseType: 'W.P.(C)', caseNumber: '12A4', year: 2023 });

      expect(result).toMatchObject({
        success: false,
        failure: { kind: 'ValidationError', message: 'Invalid search request: case number must be numeric' },
      });
      expect(driver.opened).toHaveLength(0);
      expect(await onlyAttempt(store)).toMatchObject({
        outcome: 'failure',
        errorKind: 'ValidationError',
        caseNumber: '12A4',
      });
    });

    it('should report the site as unreachable once navigation retries run out', async () => {
      const { orchestrator, portal, store } = setup({ portal: { openFailures: 10 } });

      const result = await orchestrator.search(query);

      expect(result).toMatchObject({
        success: false,
        failure: { kind: 'SiteUnreachable', message: 'The court website could not be reached after 3 attempt(s)' },
      });
      expect(portal.opens).toBe(3);
      expect(await onlyAttempt(store)).toMatchObject({ outcome: 'failure', errorKind: 'SiteUnreachable' });
    });

    it('should report the site as unreachable when the browser does not start', async () => {
      const { orchestrator } = setup({ driver: new FakeSessionDriver(new Error('browserType.launch: Executable doesn\'t exist')) });

      const result = await orchestrator.search(query);

      expect(result).toMatchObject({ success: false, failure: { kind: 'SiteUnreachable' } });
    });

    it('should give up when the result never loads', async () => {
      const { orchestrator, portal } = setup({ portal: { pages: [''] } });

      const result = await orchestrator.search(query);

      expect(result).toMatchObject({
        success: false,
        failure: { kind: 'SiteUnreachable', message: 'The result page did not load after 3 read(s)' },
      });
      expect(portal.reads).toBe(3);
    });

    it('should report the site as unreachable when every result read fails', async () => {
      const { orchestrator, portal, store } = setup({ portal: { readFailures: 5 } });

      const result = await orchestrator.search(query);

      expect(result).toMatchObject({
        success: false,
        failure: { kind: 'SiteUnreachable', message: 'The result page did not load after 3 read(s)' },
      });
      expect(portal.reads).toBe(3);
      expect(await onlyAttempt(store)).toMatchObject({ outcome: 'failure', errorKind: 'SiteUnreachable' });
    });

    it('should report a maintenance page as a parse error', async () => {
      const { orchestrator } = setup({ portal: { pages: [fixture('maintenance.html')] } });

      const result = await orchestrator.search(query);

      expect(result).toMatchObject({ success: false, failure: { kind: 'ParseError' } });
    });

    it('should report a "no record" answer as CaseNotFound', async () => {
      const { orchestrator, store } = setup({ portal: { pages: [fixture('not-found.html')] } });

      const result = await orchestrator.search(query);

      expect(result).toMatchObject({
        success: false,
        failure: { kind: 'CaseNotFound', message: 'No record found for W.P.(C)/1234/2023' },
      });
      expect(await store.getCase('W.P.(C)/1234/2023')).toBeNull();
    });

    it('should report a failed write as a storage error', async () => {
      class FailingStore extends MemorySearchStore {
        override async upsertCase(_record: CaseRecord): Promise<UpsertResult> {
          throw new StorageError('disk full');
        }
      }
      const store = new FailingStore();
      const { orchestrator } = setup({ store });

      const result = await orchestrator.search(query);

      expect(result).toMatchObject({ success: false, failure: { kind: 'StorageError', message: 'disk full' } });
      expect(await onlyAttempt(store)).toMatchObject({ outcome: 'failure', errorKind: 'StorageError' });
    });

    it('should refuse to reuse an attempt id', async () => {
      const { orchestrator, store, driver } = setup();
      await orchestrator.search(query, { attemptId: 'attempt-1' });

      const second = await orchestrator.search(query, { attemptId: 'attempt-1' });

      expect(second).toMatchObject({ success: false, failure: { kind: 'StorageError' } });
      expect(driver.opened).toHaveLength(1);
      expect(await onlyAttempt(store)).toMatchObject({ outcome: 'success' });
    });

    it('should announce failures', async () => {
      const { orchestrator } = setup({ portal: { pages: [fixture('maintenance.html')] } });
      const failed: string[] = [];
      orchestrator.on('search:failed', ({ failure }) => failed.push(failure.kind));

      await orchestrator.search(query);

      expect(failed).toEqual(['ParseError']);
    });
  });

  it('should map failure kinds to stored outcomes', () => {
    expect(outcomeFor('ChallengeTimeout')).toBe('timeout');
    expect(outcomeFor('AttemptTimeout')).toBe('timeout');
    expect(outcomeFor('ChallengeExhausted')).toBe('captcha_required');
    expect(outcomeFor('ParseError')).toBe('failure');
    expect(outcomeFor('Cancelled')).toBe('failure');
  });
});
