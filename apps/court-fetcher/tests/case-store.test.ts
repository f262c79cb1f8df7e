/**
 * Persistence tests on a real SQLite file
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StorageError, type CaseRecord, type SearchAttempt } from 'court-playwright';
import type { LibsqlSearchStore } from '../src/services/case-store.js';
import { createTempStore } from './support/engine.js';

function attempt(id: string, submittedAt: string, overrides: Partial<SearchAttempt> = {}): SearchAttempt {
  return {
    id,
    caseType: 'W.P.(C)',
    caseNumber: '1234',
    year: 2023,
    submittedAt: new Date(submittedAt),
    outcome: 'pending',
    errorKind: null,
    errorDetail: null,
    completedAt: null,
    caseId: null,
    ...overrides,
  };
}

const record: CaseRecord = {
  caseType: 'W.P.(C)',
  caseNumber: '1234',
  year: 2023,
  title: 'W.P.(C) 1234/2023: X vs. Y',
  petitioner: 'X',
  respondent: 'Y',
  filingDate: '2023-01-15',
  nextHearingDate: null,
  status: 'Pending',
  bench: null,
  orders: [
    { date: '2023-05-01', description: 'Order on application', pdfUrl: 'https://court.test/app/a.pdf', kind: 'order' },
    { date: null, description: 'Order without a date', pdfUrl: null, kind: 'order' },
  ],
};

describe('LibsqlSearchStore', () => {
  let store: LibsqlSearchStore;
  let cleanup: () => void;

  beforeEach(async () => {
    ({ store, cleanup } = await createTempStore());
  });

  afterEach(() => {
    cleanup();
  });

  describe('attempts', () => {
    it('should store an attempt and record its outcome once', async () => {
      await store.logAttempt(attempt('a1', '2024-01-01T10:00:00.000Z'));

      const updated = await store.recordOutcome('a1', {
        outcome: 'captcha_required',
        errorKind: 'ChallengeExhausted',
        errorDetail: 'CAPTCHA was not accepted after 3 attempt(s)',
      });

      expect(updated).toMatchObject({
        id: 'a1',
        caseType: 'W.P.(C)',
        year: 2023,
        outcome: 'captcha_required',
        errorKind: 'ChallengeExhausted',
        errorDetail: 'CAPTCHA was not accepted after 3 attempt(s)',
        caseId: null,
      });
      expect(updated.submittedAt.toISOString()).toBe('2024-01-01T10:00:00.000Z');
      expect(updated.completedAt).toBeInstanceOf(Date);

      await expect(store.recordOutcome('a1', { outcome: 'success', caseId: 'x' }))
        .rejects.toThrow('Search attempt a1 already has an outcome');
    });

    it('should fail for an attempt that was never logged', async () => {
      await expect(store.recordOutcome('missing', { outcome: 'success', caseId: 'x' }))
        .rejects.toThrow('Search attempt missing does not exist');
    });

    it('should report a reused attempt id as a conflict', async () => {
      await store.logAttempt(attempt('a1', '2024-01-01T10:00:00.000Z'));

      const error = await store.logAttempt(attempt('a1', '2024-01-01T10:00:00.000Z')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({ kind: 'StorageError', conflict: true });
    });

    it('should keep attempts without a usable year', async () => {
      await store.logAttempt(attempt('a1', '2024-01-01T10:00:00.000Z', { year: null, caseNumber: '12A4' }));

      expect(await store.getAttempt('a1')).toMatchObject({ year: null, caseNumber: '12A4', outcome: 'pending' });
    });
  });

  describe('cases', () => {
    it('should create a case with its orders', async () => {
      const result = await store.upsertCase(record);

      expect(result).toEqual({ caseId: 'W.P.(C)/1234/2023', created: true, ordersInserted: 2, ordersUpdated: 0 });

      const detail = await store.getCase('W.P.(C)/1234/2023');
      expect(detail?.case).toMatchObject({
        caseType: 'W.P.(C)',
        caseNumber: '1234',
        year: 2023,
        petitioner: 'X',
        respondent: 'Y',
        filingDate: '2023-01-15',
        nextHearingDate: null,
        version: 1,
      });
      expect(detail?.orders.map((order) => [order.orderDate, order.description, order.pdfLocation])).toEqual([
        ['2023-05-01', 'Order on application', 'https://court.test/app/a.pdf'],
        [null, 'Order without a date', null],
      ]);
    });

    it('should not write anything for an unchanged re-fetch except the version', async () => {
      await store.upsertCase(record);

      const again = await store.upsertCase(record);

      expect(again).toEqual({ caseId: 'W.P.(C)/1234/2023', created: false, ordersInserted: 0, ordersUpdated: 0 });
      const detail = await store.getCase('W.P.(C)/1234/2023');
      expect(detail?.case.version).toBe(2);
      expect(detail?.orders).toHaveLength(2);
    });

    it('should update changed orders and add new ones', async () => {
      await store.upsertCase(record);

      const result = await store.upsertCase({
        ...record,
        status: 'Disposed',
        orders: [
          { date: '2023-05-01', description: 'Order on application', pdfUrl: 'https://court.test/app/b.pdf', kind: 'order' },
          { date: '2023-08-09', description: 'Final judgment', pdfUrl: null, kind: 'judgment' },
        ],
      });

      expect(result).toMatchObject({ created: false, ordersInserted: 1, ordersUpdated: 1 });
      const detail = await store.getCase('W.P.(C)/1234/2023');
      expect(detail?.case.status).toBe('Disposed');
      expect(detail?.orders.map((order) => order.pdfLocation)).toContain('https://court.test/app/b.pdf');
      expect(detail?.orders.find((order) => order.description === 'Final judgment')?.kind).toBe('judgment');
      expect(detail?.orders).toHaveLength(3);
    });

    it('should apply concurrent upserts of one case one after the other', async () => {
      const results = await Promise.all([store.upsertCase(record), store.upsertCase(record)]);

      expect(results.map((result) => result.created).sort()).toEqual([false, true]);
      const detail = await store.getCase('W.P.(C)/1234/2023');
      expect(detail?.case.version).toBe(2);
      expect(detail?.orders).toHaveLength(2);
    });

    it('should find a case by its parts', async () => {
      await store.upsertCase(record);

      expect((await store.findCase(' w.p.(c) ', '01234', 2023))?.case.id).toBe('W.P.(C)/1234/2023');
      expect(await store.findCase('W.P.(C)', '99', 2023)).toBeNull();
    });
  });

  describe('history', () => {
    beforeEach(async () => {
      await store.logAttempt(attempt('a1', '2024-01-01T10:00:00.000Z'));
      await store.logAttempt(attempt('a2', '2024-01-02T10:00:00.000Z', { caseType: 'CRL.A.', caseNumber: '7' }));
      await store.logAttempt(attempt('a3', '2024-01-03T10:00:00.000Z'));
      await store.recordOutcome('a3', { outcome: 'timeout', errorKind: 'ChallengeTimeout', errorDetail: 'late' });
    });

    it('should list attempts newest first', async () => {
      const page = await store.listHistory();

      expect(page.items.map((item) => item.id)).toEqual(['a3', 'a2', 'a1']);
      expect(page).toMatchObject({ total: 3, limit: 50, offset: 0 });
    });

    it('should filter and paginate', async () => {
      const page = await store.listHistory({ caseType: 'W.P.(C)' }, { limit: 1, offset: 1 });

      expect(page).toMatchObject({ total: 2, limit: 1, offset: 1 });
      expect(page.items.map((item) => item.id)).toEqual(['a1']);

      const timeouts = await store.listHistory({ outcome: 'timeout' });
      expect(timeouts.items.map((item) => item.id)).toEqual(['a3']);

      const recent = await store.listHistory({ since: new Date('2024-01-02T00:00:00.000Z') });
      expect(recent.total).toBe(2);
    });

    it('should compute statistics', async () => {
      await store.logAttempt(attempt('a4', '2024-01-03T12:00:00.000Z'));
      await store.upsertCase(record);
      await store.recordOutcome('a4', { outcome: 'success', caseId: 'W.P.(C)/1234/2023' });

      const stats = await store.getStatistics(new Date('2024-01-04T00:00:00.000Z'));

      expect(stats).toEqual({
        totalSearches: 4,
        successfulSearches: 1,
        successRate: 25,
        recentSearches: 2,
        popularCaseTypes: [
          { caseType: 'W.P.(C)', count: 3 },
          { caseType: 'CRL.A.', count: 1 },
        ],
        storedCases: 1,
      });
    });

    it('should prune old failed attempts only', async () => {
      await store.recordOutcome('a1', { outcome: 'failure', errorKind: 'ParseError', errorDetail: 'x' });

      const pruned = await store.pruneFailedAttempts(1);

      // a1 (failure) and a3 (timeout) are old; a2 is still pending
      expect(pruned).toBe(2);
      expect((await store.listHistory()).items.map((item) => item.id)).toEqual(['a2']);
    });
  });

  it('should answer a ping', async () => {
    expect(await store.ping()).toBe(true);
  });
});
