/**
 * Persistence store on libsql (SQLite)
 *
 * Tables:
 * - search_attempts: one row per search attempt, outcome written once
 * - cases: one row per natural key, versioned on every re-fetch
 * - orders: orders of a case, unique by (date, description)
 */

import { createClient, LibsqlError, type Client, type InStatement, type ResultSet, type Row, type Transaction } from '@libsql/client';
import {
  StorageError,
  caseKey,
  clampPagination,
  dedupeOrders,
  orderIdentity,
  type AttemptOutcome,
  type AttemptResult,
  type CaseDetail,
  type CaseRecord,
  type FailureKind,
  type HistoryFilter,
  type HistoryPage,
  type OrderKind,
  type Pagination,
  type SearchAttempt,
  type SearchLogger,
  type SearchStore,
  type StoredCase,
  type StoredOrder,
  type UpsertResult,
} from 'court-playwright';
import type { SearchStatistics } from '../types/index.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS cases (
    id TEXT PRIMARY KEY,
    case_type TEXT NOT NULL,
    case_number TEXT NOT NULL,
    year INTEGER NOT NULL,
    title TEXT,
    petitioner TEXT,
    respondent TEXT,
    filing_date TEXT,
    next_hearing_date TEXT,
    status TEXT,
    bench TEXT,
    version INTEGER NOT NULL DEFAULT 1,
    first_fetched_at TEXT NOT NULL,
    last_fetched_at TEXT NOT NULL,
    UNIQUE (case_type, case_number, year)
  );

  CREATE TABLE IF NOT EXISTS orders (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    case_id TEXT NOT NULL REFERENCES cases(id) ON DELETE CASCADE,
    order_date TEXT NOT NULL DEFAULT '',
    description TEXT NOT NULL,
    pdf_location TEXT,
    kind TEXT NOT NULL CHECK (kind IN ('order', 'judgment')),
    position INTEGER NOT NULL,
    UNIQUE (case_id, order_date, description)
  );

  CREATE TABLE IF NOT EXISTS search_attempts (
    id TEXT PRIMARY KEY,
    case_type TEXT NOT NULL,
    case_number TEXT NOT NULL,
    year INTEGER,
    submitted_at TEXT NOT NULL,
    outcome TEXT NOT NULL CHECK (outcome IN ('pending', 'success', 'failure', 'captcha_required', 'timeout')),
    error_kind TEXT,
    error_detail TEXT,
    completed_at TEXT,
    case_id TEXT REFERENCES cases(id)
  );

  CREATE INDEX IF NOT EXISTS idx_attempts_submitted ON search_attempts (submitted_at DESC);
  CREATE INDEX IF NOT EXISTS idx_attempts_case ON search_attempts (case_type, case_number, year);
  CREATE INDEX IF NOT EXISTS idx_orders_case ON orders (case_id, position);
`;

const OUTCOMES: readonly AttemptOutcome[] = ['pending', 'success', 'failure', 'captcha_required', 'timeout'];

const FAILURE_KINDS: readonly FailureKind[] = [
  'ValidationError',
  'SiteUnreachable',
  'ChallengeTimeout',
  'ChallengeExhausted',
  'ParseError',
  'StorageError',
  'Cancelled',
  'CaseNotFound',
  'AttemptTimeout',
];

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================
// Row mapping
// ============================================

function text(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return String(value);
}

function requiredText(row: Row, column: string): string {
  return text(row, column) ?? '';
}

function integer(row: Row, column: string): number | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return Number(value);
}

function date(row: Row, column: string): Date | null {
  const value = text(row, column);
  return value ? new Date(value) : null;
}

function isOutcome(value: string | null): value is AttemptOutcome {
  return OUTCOMES.some((outcome) => outcome === value);
}

function isFailureKind(value: string | null): value is FailureKind {
  return FAILURE_KINDS.some((kind) => kind === value);
}

function toAttempt(row: Row): SearchAttempt {
  const outcome = text(row, 'outcome');
  const errorKind = text(row, 'error_kind');
  return {
    id: requiredText(row, 'id'),
    caseType: requiredText(row, 'case_type'),
    caseNumber: requiredText(row, 'case_number'),
    year: integer(row, 'year'),
    submittedAt: date(row, 'submitted_at') ?? new Date(0),
    outcome: isOutcome(outcome) ? outcome : 'failure',
    errorKind: isFailureKind(errorKind) ? errorKind : null,
    errorDetail: text(row, 'error_detail'),
    completedAt: date(row, 'completed_at'),
    caseId: text(row, 'case_id'),
  };
}

function toCase(row: Row): StoredCase {
  const now = new Date();
  return {
    id: requiredText(row, 'id'),
    caseType: requiredText(row, 'case_type'),
    caseNumber: requiredText(row, 'case_number'),
    year: integer(row, 'year') ?? 0,
    title: text(row, 'title'),
    petitioner: text(row, 'petitioner'),
    respondent: text(row, 'respondent'),
    filingDate: text(row, 'filing_date'),
    nextHearingDate: text(row, 'next_hearing_date'),
    status: text(row, 'status'),
    bench: text(row, 'bench'),
    version: integer(row, 'version') ?? 1,
    firstFetchedAt: date(row, 'first_fetched_at') ?? now,
    lastFetchedAt: date(row, 'last_fetched_at') ?? now,
  };
}

function toOrder(row: Row): StoredOrder {
  const kind: OrderKind = text(row, 'kind') === 'judgment' ? 'judgment' : 'order';
  return {
    id: integer(row, 'id') ?? 0,
    caseId: requiredText(row, 'case_id'),
    // unknown dates are stored as '' so the unique index covers them
    orderDate: text(row, 'order_date') || null,
    description: requiredText(row, 'description'),
    pdfLocation: text(row, 'pdf_location'),
    kind,
    position: integer(row, 'position') ?? 0,
  };
}

// ============================================
// Errors
// ============================================

/** SQLite lock and constraint errors mean another writer got there first */
function isConflict(error: unknown): boolean {
  if (!(error instanceof LibsqlError)) return false;
  return error.code.startsWith('SQLITE_BUSY') ||
    error.code.startsWith('SQLITE_LOCKED') ||
    error.code.startsWith('SQLITE_CONSTRAINT');
}

function toStorageError(message: string, error: unknown): StorageError {
  if (error instanceof StorageError) return error;
  return new StorageError(message, isConflict(error), { cause: error });
}

// ============================================
// Write serialization
// ============================================

/**
 * Runs tasks one after another. SQLite accepts a single writer, so every
 * write of the store goes through the same queue, which also keeps two
 * upserts of one case from interleaving.
 */
class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

// ============================================
// Store
// ============================================

export interface CaseStoreOptions {
  url: string;
  authToken?: string;
  logger?: SearchLogger;
}

export class LibsqlSearchStore implements SearchStore {
  private readonly writes = new SerialQueue();

  constructor(
    private readonly client: Client,
    private readonly logger?: SearchLogger,
  ) {}

  /** Connects and creates the tables when missing */
  static async open(options: CaseStoreOptions): Promise<LibsqlSearchStore> {
    const client = createClient({ url: options.url, authToken: options.authToken });
    const store = new LibsqlSearchStore(client, options.logger);
    await store.migrate();
    return store;
  }

  async migrate(): Promise<void> {
    try {
      await this.client.executeMultiple(SCHEMA);
    } catch (error) {
      throw toStorageError('Failed to prepare the database', error);
    }
  }

  close(): void {
    this.client.close();
  }

  // ============================================
  // Attempts
  // ============================================

  async logAttempt(attempt: SearchAttempt): Promise<void> {
    await this.write('Failed to log the search attempt', () => this.client.execute({
      sql: `INSERT INTO search_attempts
              (id, case_type, case_number, year, submitted_at, outcome, error_kind, error_detail, completed_at, case_id)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      args: [
        attempt.id,
        attempt.caseType,
        attempt.caseNumber,
        attempt.year,
        attempt.submittedAt.toISOString(),
        attempt.outcome,
        attempt.errorKind,
        attempt.errorDetail,
        attempt.completedAt?.toISOString() ?? null,
        attempt.caseId,
      ],
    }));
  }

  async recordOutcome(attemptId: string, result: AttemptResult): Promise<SearchAttempt> {
    const completedAt = new Date().toISOString();
    const statement: InStatement = result.outcome === 'success'
      ? {
        sql: `UPDATE search_attempts SET outcome = 'success', case_id = ?, completed_at = ?
              WHERE id = ? AND outcome = 'pending'`,
        args: [result.caseId, completedAt, attemptId],
      }
      : {
        sql: `UPDATE search_attempts SET outcome = ?, error_kind = ?, error_detail = ?, completed_at = ?
              WHERE id = ? AND outcome = 'pending'`,
        args: [result.outcome, result.errorKind, result.errorDetail, completedAt, attemptId],
      };

    const updated = await this.write('Failed to record the search outcome', () => this.client.execute(statement));
    const attempt = await this.getAttempt(attemptId);

    if (!attempt) throw new StorageError(`Search attempt ${attemptId} does not exist`);
    if (updated.rowsAffected === 0) {
      throw new StorageError(`Search attempt ${attemptId} already has an outcome`);
    }
    return attempt;
  }

  async getAttempt(attemptId: string): Promise<SearchAttempt | null> {
    const result = await this.read('Failed to read the search attempt', {
      sql: 'SELECT * FROM search_attempts WHERE id = ?',
      args: [attemptId],
    });
    const row = result.rows[0];
    return row ? toAttempt(row) : null;
  }

  /** Deletes unsuccessful attempts older than `days`; returns how many went */
  async pruneFailedAttempts(days: number): Promise<number> {
    const cutoff = new Date(Date.now() - days * DAY_MS).toISOString();
    const result = await this.write('Failed to prune the search history', () => this.client.execute({
      sql: `DELETE FROM search_attempts
            WHERE outcome NOT IN ('pending', 'success') AND submitted_at < ?`,
      args: [cutoff],
    }));
    return result.rowsAffected;
  }

  // ============================================
  // Cases
  // ============================================

  async upsertCase(record: CaseRecord): Promise<UpsertResult> {
    const caseId = caseKey(record.caseType, record.caseNumber, record.year);

    return this.write(`Failed to store case ${caseId}`, async () => {
      const tx = await this.client.transaction('write');
      try {
        const result = await this.upsertIn(tx, caseId, record);
        await tx.commit();
        return result;
      } catch (error) {
        await this.rollback(tx, caseId);
        throw error;
      } finally {
        tx.close();
      }
    });
  }

  async getCase(caseId: string): Promise<CaseDetail | null> {
    const found = await this.read('Failed to read the case', {
      sql: 'SELECT * FROM cases WHERE id = ?',
      args: [caseId],
    });
    const row = found.rows[0];
    if (!row) return null;

    const orders = await this.read('Failed to read the orders', {
      sql: 'SELECT * FROM orders WHERE case_id = ? ORDER BY position, id',
      args: [caseId],
    });
    return { case: toCase(row), orders: orders.rows.map(toOrder) };
  }

  findCase(caseType: string, caseNumber: string, year: number): Promise<CaseDetail | null> {
    return this.getCase(caseKey(caseType, caseNumber, year));
  }

  // ============================================
  // History & statistics
  // ============================================

  async listHistory(filter: HistoryFilter = {}, pagination?: Pagination): Promise<HistoryPage> {
    const { limit, offset } = clampPagination(pagination);
    const clauses: string[] = [];
    const args: Array<string | number> = [];

    if (filter.caseType) {
      clauses.push('case_type = ?');
      args.push(filter.caseType);
    }
    if (filter.caseNumber) {
      clauses.push('case_number = ?');
      args.push(filter.caseNumber);
    }
    if (filter.year !== undefined) {
      clauses.push('year = ?');
      args.push(filter.year);
    }
    if (filter.outcome) {
      clauses.push('outcome = ?');
      args.push(filter.outcome);
    }
    if (filter.since) {
      clauses.push('submitted_at >= ?');
      args.push(filter.since.toISOString());
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const [count, page] = await Promise.all([
      this.read('Failed to count the search history', {
        sql: `SELECT COUNT(*) AS total FROM search_attempts ${where}`,
        args,
      }),
      this.read('Failed to read the search history', {
        sql: `SELECT * FROM search_attempts ${where} ORDER BY submitted_at DESC, rowid DESC LIMIT ? OFFSET ?`,
        args: [...args, limit, offset],
      }),
    ]);

    const countRow = count.rows[0];
    return {
      items: page.rows.map(toAttempt),
      total: countRow ? integer(countRow, 'total') ?? 0 : 0,
      limit,
      offset,
    };
  }

  async getStatistics(now: Date = new Date()): Promise<SearchStatistics> {
    const since = new Date(now.getTime() - DAY_MS).toISOString();
    const [totals, popular, cases] = await Promise.all([
      this.read('Failed to read statistics', {
        sql: `SELECT
                COUNT(*) AS total,
                COALESCE(SUM(CASE WHEN outcome = 'success' THEN 1 ELSE 0 END), 0) AS successful,
                COALESCE(SUM(CASE WHEN submitted_at > ? THEN 1 ELSE 0 END), 0) AS recent
              FROM search_attempts`,
        args: [since],
      }),
      this.read('Failed to read statistics', `
        SELECT case_type, COUNT(*) AS count
        FROM search_attempts
        GROUP BY case_type
        ORDER BY count DESC, case_type
        LIMIT 10
      `),
      this.read('Failed to read statistics', 'SELECT COUNT(*) AS total FROM cases'),
    ]);

    const row = totals.rows[0];
    const totalSearches = row ? integer(row, 'total') ?? 0 : 0;
    const successfulSearches = row ? integer(row, 'successful') ?? 0 : 0;
    const casesRow = cases.rows[0];

    return {
      totalSearches,
      successfulSearches,
      successRate: totalSearches > 0 ? (successfulSearches / totalSearches) * 100 : 0,
      recentSearches: row ? integer(row, 'recent') ?? 0 : 0,
      popularCaseTypes: popular.rows.map((entry) => ({
        caseType: requiredText(entry, 'case_type'),
        count: integer(entry, 'count') ?? 0,
      })),
      storedCases: casesRow ? integer(casesRow, 'total') ?? 0 : 0,
    };
  }

  /** True when the database answers a trivial query */
  async ping(): Promise<boolean> {
    try {
      await this.client.execute('SELECT 1');
      return true;
    } catch (error) {
      this.logger?.error('Database ping failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  // ============================================
  // Internals
  // ============================================

  private async upsertIn(tx: Transaction, caseId: string, record: CaseRecord): Promise<UpsertResult> {
    const now = new Date().toISOString();
    const existing = await tx.execute({ sql: 'SELECT version FROM cases WHERE id = ?', args: [caseId] });
    const created = existing.rows.length === 0;

    await tx.execute({
      sql: `INSERT INTO cases
              (id, case_type, case_number, year, title, petitioner, respondent, filing_date,
               next_hearing_date, status, bench, version, first_fetched_at, last_fetched_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)
            ON CONFLICT (id) DO UPDATE SET
              title = excluded.title,
              petitioner = excluded.petitioner,
              respondent = excluded.respondent,
              filing_date = excluded.filing_date,
              next_hearing_date = excluded.next_hearing_date,
              status = excluded.status,
              bench = excluded.bench,
              version = cases.version + 1,
              last_fetched_at = excluded.last_fetched_at`,
      args: [
        caseId,
        record.caseType,
        record.caseNumber,
        record.year,
        record.title,
        record.petitioner,
        record.respondent,
        record.filingDate,
        record.nextHearingDate,
        record.status,
        record.bench,
        now,
        now,
      ],
    });

    const stored = await tx.execute({
      sql: 'SELECT id, order_date, description, pdf_location, kind FROM orders WHERE case_id = ?',
      args: [caseId],
    });
    const byIdentity = new Map(stored.rows.map((row) => [
      orderIdentity(text(row, 'order_date') || null, requiredText(row, 'description')),
      row,
    ]));

    let ordersInserted = 0;
    let ordersUpdated = 0;
    const orders = dedupeOrders(record.orders);

    for (const [position, order] of orders.entries()) {
      const current = byIdentity.get(orderIdentity(order.date, order.description));
      if (!current) {
        await tx.execute({
          sql: `INSERT INTO orders (case_id, order_date, description, pdf_location, kind, position)
                VALUES (?, ?, ?, ?, ?, ?)`,
          args: [caseId, order.date ?? '', order.description, order.pdfUrl, order.kind, position],
        });
        ordersInserted++;
      } else if (text(current, 'pdf_location') !== order.pdfUrl || text(current, 'kind') !== order.kind) {
        await tx.execute({
          sql: 'UPDATE orders SET pdf_location = ?, kind = ? WHERE id = ?',
          args: [order.pdfUrl, order.kind, integer(current, 'id')],
        });
        ordersUpdated++;
      }
    }

    return { caseId, created, ordersInserted, ordersUpdated };
  }

  private async rollback(tx: Transaction, caseId: string): Promise<void> {
    if (tx.closed) return;
    try {
      await tx.rollback();
    } catch (error) {
      this.logger?.warn('Rollback failed', { caseId, error: error instanceof Error ? error.message : String(error) });
    }
  }

  private async write<T>(message: string, task: () => Promise<T>): Promise<T> {
    try {
      return await this.writes.run(task);
    } catch (error) {
      throw toStorageError(message, error);
    }
  }

  private async read(message: string, statement: InStatement): Promise<ResultSet> {
    try {
      return await this.client.execute(statement);
    } catch (error) {
      throw toStorageError(message, error);
    }
  }
}
