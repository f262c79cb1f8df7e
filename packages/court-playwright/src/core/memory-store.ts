/**
 * In-memory SearchStore, for scripts and tests that need no database
 */

import type {
  AttemptResult,
  CaseDetail,
  CaseRecord,
  HistoryFilter,
  HistoryPage,
  OrderEntry,
  Pagination,
  SearchAttempt,
  SearchStore,
  StoredCase,
  StoredOrder,
  UpsertResult,
} from '../types/index.js';
import { caseKey } from '../highcourt/catalogue.js';
import { StorageError } from './errors.js';

export const HISTORY_DEFAULT_LIMIT = 50;
export const HISTORY_MAX_LIMIT = 200;

/** Identity of an order inside its case */
export function orderIdentity(date: string | null, description: string): string {
  return `${date ?? ''}\u0000${description}`;
}

/** First occurrence wins when a page lists the same order twice */
export function dedupeOrders(orders: readonly OrderEntry[]): OrderEntry[] {
  const seen = new Set<string>();
  return orders.filter((order) => {
    const key = orderIdentity(order.date, order.description);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function clampPagination(pagination: Pagination = {}): { limit: number; offset: number } {
  const limit = Math.min(HISTORY_MAX_LIMIT, Math.max(1, Math.trunc(pagination.limit ?? HISTORY_DEFAULT_LIMIT)));
  const offset = Math.max(0, Math.trunc(pagination.offset ?? 0));
  return { limit, offset };
}

export class MemorySearchStore implements SearchStore {
  private attempts = new Map<string, SearchAttempt>();
  private cases = new Map<string, StoredCase>();
  private orders = new Map<string, StoredOrder[]>();
  private nextOrderId = 1;

  async logAttempt(attempt: SearchAttempt): Promise<void> {
    if (this.attempts.has(attempt.id)) {
      throw new StorageError(`Search attempt ${attempt.id} already exists`, true);
    }
    this.attempts.set(attempt.id, { ...attempt });
  }

  async recordOutcome(attemptId: string, result: AttemptResult): Promise<SearchAttempt> {
    const attempt = this.attempts.get(attemptId);
    if (!attempt) throw new StorageError(`Search attempt ${attemptId} does not exist`);
    if (attempt.outcome !== 'pending') {
      throw new StorageError(`Search attempt ${attemptId} already has an outcome`);
    }

    const updated: SearchAttempt = result.outcome === 'success'
      ? { ...attempt, outcome: 'success', caseId: result.caseId, completedAt: new Date() }
      : {
        ...attempt,
        outcome: result.outcome,
        errorKind: result.errorKind,
        errorDetail: result.errorDetail,
        completedAt: new Date(),
      };
    this.attempts.set(attemptId, updated);
    return { ...updated };
  }

  async upsertCase(record: CaseRecord): Promise<UpsertResult> {
    const caseId = caseKey(record.caseType, record.caseNumber, record.year);
    const now = new Date();
    const existing = this.cases.get(caseId);

    this.cases.set(caseId, {
      id: caseId,
      caseType: record.caseType,
      caseNumber: record.caseNumber,
      year: record.year,
      title: record.title,
      petitioner: record.petitioner,
      respondent: record.respondent,
      filingDate: record.filingDate,
      nextHearingDate: record.nextHearingDate,
      status: record.status,
      bench: record.bench,
      version: existing ? existing.version + 1 : 1,
      firstFetchedAt: existing?.firstFetchedAt ?? now,
      lastFetchedAt: now,
    });

    const stored = this.orders.get(caseId) ?? [];
    const byIdentity = new Map(stored.map((order) => [orderIdentity(order.orderDate, order.description), order]));
    let ordersInserted = 0;
    let ordersUpdated = 0;

    dedupeOrders(record.orders).forEach((order, position) => {
      const current = byIdentity.get(orderIdentity(order.date, order.description));
      if (!current) {
        stored.push({
          id: this.nextOrderId++,
          caseId,
          orderDate: order.date,
          description: order.description,
          pdfLocation: order.pdfUrl,
          kind: order.kind,
          position,
        });
        ordersInserted++;
      } else if (current.pdfLocation !== order.pdfUrl || current.kind !== order.kind) {
        current.pdfLocation = order.pdfUrl;
        current.kind = order.kind;
        ordersUpdated++;
      }
    });
    this.orders.set(caseId, stored);

    return { caseId, created: !existing, ordersInserted, ordersUpdated };
  }

  async getCase(caseId: string): Promise<CaseDetail | null> {
    const found = this.cases.get(caseId);
    if (!found) return null;
    const orders = (this.orders.get(caseId) ?? [])
      .map((order) => ({ ...order }))
      .sort((a, b) => a.position - b.position || a.id - b.id);
    return { case: { ...found }, orders };
  }

  async listHistory(filter: HistoryFilter = {}, pagination?: Pagination): Promise<HistoryPage> {
    const { limit, offset } = clampPagination(pagination);
    const matching = [...this.attempts.values()]
      .filter((attempt) =>
        (!filter.caseType || attempt.caseType === filter.caseType) &&
        (!filter.caseNumber || attempt.caseNumber === filter.caseNumber) &&
        (filter.year === undefined || attempt.year === filter.year) &&
        (!filter.outcome || attempt.outcome === filter.outcome) &&
        (!filter.since || attempt.submittedAt >= filter.since))
      .sort((a, b) => b.submittedAt.getTime() - a.submittedAt.getTime());

    return {
      items: matching.slice(offset, offset + limit).map((attempt) => ({ ...attempt })),
      total: matching.length,
      limit,
      offset,
    };
  }
}
