/**
 * Result page parser for the High Court case-status pages.
 *
 * Turns the rendered result page into a CaseRecord. Missing fields are
 * reported as null; only a page that is not a result page at all fails.
 */

import { load, type CheerioAPI } from 'cheerio';
import type {
  CaseQuery,
  CaseRecord,
  CaseResultParser,
  OrderEntry,
  PageKind,
  ResultPage,
  SearchLogger,
} from '../types/index.js';
import { CaseNotFoundError, ParseError } from '../core/errors.js';
import { caseKey, DEFAULT_COURT_URL } from '../highcourt/catalogue.js';
import { DATE_FRAGMENT, parseLenientDate } from './dates.js';
import { cleanText, extractField, FIELD_RULES, type FieldRule } from './field-extractors.js';

export interface ResultParserOptions {
  /** Base for relative PDF links when the page URL is unusable */
  baseUrl?: string;
  logger?: SearchLogger;
}

const NOT_FOUND = /no records? found|invalid case number|case (?:does not exist|not found)|no case found/i;
const ERROR_PAGE = /maintenance|service unavailable|error occurred|internal server error|bad gateway|try again later|forbidden|access denied/i;
const SEARCH_FORM = 'select[name="case_type"], #case_type';

const DATE_HEADER = /date/i;
const DESCRIPTION_HEADER = /order|judg|description|particular|detail|remark/i;
const LINK_HEADER = /link|pdf|download|view|document/i;
const SERIAL_HEADER = /^(?:s\.?\s*no\.?|sr\.?\s*no\.?|serial(?:\s+no\.?)?|#|no\.?)$/i;
const JUDGMENT = /judg?ment/i;
const PDF_HREF = /\.pdf|download|showlogo|viewpdf/i;
const PDF_TEXT = /pdf|view|download/i;

// ============================================
// Table snapshot
// ============================================

interface CellLink {
  href: string;
  text: string;
}

interface TableCell {
  text: string;
  links: CellLink[];
}

interface TableRow {
  cells: TableCell[];
  isHeader: boolean;
}

/** Plain-data copy of every table, so the order logic never touches the DOM */
function snapshotTables($: CheerioAPI): TableRow[][] {
  return $('table').toArray().map((table) =>
    $(table).find('tr').toArray().map((row) => ({
      isHeader: $(row).children('th').length > 0,
      cells: $(row).children('td, th').toArray().map((cell) => ({
        text: cleanText($(cell).text()),
        links: $(cell).find('a[href]').toArray().map((a) => ({
          href: ($(a).attr('href') ?? '').trim(),
          text: cleanText($(a).text()),
        })),
      })),
    })),
  );
}

interface OrdersLayout {
  headerIndex: number;
  serialCol: number;
  dateCol: number;
  descriptionCol: number;
  linkCol: number;
}

function isFieldLabel(text: string): boolean {
  return FIELD_RULES.some((rule) => rule.labels.some((re) => re.test(text)));
}

function detectOrdersLayout(rows: TableRow[]): OrdersLayout | null {
  const headerIndex = Math.max(0, rows.findIndex((row) => row.isHeader));
  const header = rows[headerIndex];
  if (!header || header.cells.length < 2) return null;
  // a label/value table whose first row happens to mention an order
  if (!header.isHeader && isFieldLabel(header.cells[0]?.text ?? '')) return null;

  const headers = header.cells.map((cell) => cell.text);
  const mentionsOrders = headers.some((text) => /order|judg?ment/i.test(text));
  const dateAndLink = headers.some((text) => /^date/i.test(text)) && headers.some((text) => LINK_HEADER.test(text));
  if (!mentionsOrders && !dateAndLink) return null;

  return {
    headerIndex,
    serialCol: headers.findIndex((text) => SERIAL_HEADER.test(text)),
    dateCol: headers.findIndex((text) => DATE_HEADER.test(text)),
    descriptionCol: headers.findIndex((text) =>
      DESCRIPTION_HEADER.test(text) &&
      !DATE_HEADER.test(text) &&
      !LINK_HEADER.test(text) &&
      !SERIAL_HEADER.test(text)),
    linkCol: headers.findIndex((text) => LINK_HEADER.test(text)),
  };
}

function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

function findPdfLink(row: TableRow, linkCol: number, base: string): string | null {
  const preferred = linkCol >= 0 ? row.cells[linkCol]?.links ?? [] : [];
  const candidates = [...preferred, ...row.cells.flatMap((cell) => cell.links)];

  for (const link of candidates) {
    if (!link.href || link.href === '#' || /^javascript:/i.test(link.href)) continue;
    if (PDF_HREF.test(link.href) || PDF_TEXT.test(link.text)) {
      const url = resolveUrl(link.href, base);
      if (url) return url;
    }
  }
  return null;
}

function findRowDate(row: TableRow, dateCol: number): string | null {
  const fromColumn = dateCol >= 0 ? parseLenientDate(row.cells[dateCol]?.text) : null;
  if (fromColumn) return fromColumn;

  for (const cell of row.cells) {
    const fragment = DATE_FRAGMENT.exec(cell.text);
    const date = fragment ? parseLenientDate(fragment[0]) : null;
    if (date) return date;
  }
  return null;
}

/** Serial number, else the PDF file, so rows of one date stay apart */
function rowReference(row: TableRow, serialCol: number, pdfUrl: string | null): string | null {
  const serial = serialCol >= 0 ? row.cells[serialCol]?.text ?? '' : '';
  if (serial) return `No. ${serial}`;
  if (!pdfUrl) return null;

  const url = new URL(pdfUrl);
  const file = url.pathname.split('/').filter(Boolean).pop() ?? '';
  return `${file}${url.search}` || null;
}

function toOrderEntry(row: TableRow, layout: OrdersLayout, base: string): OrderEntry | null {
  const date = findRowDate(row, layout.dateCol);
  const pdfUrl = findPdfLink(row, layout.linkCol, base);
  if (!date && !pdfUrl) return null;

  const rowText = row.cells.map((cell) => cell.text).join(' ');
  const kind = JUDGMENT.test(rowText) ? 'judgment' : 'order';

  let description = layout.descriptionCol >= 0 ? row.cells[layout.descriptionCol]?.text ?? '' : '';
  if (!description || (PDF_TEXT.test(description) && description.length <= 12)) {
    description = `${kind === 'judgment' ? 'Judgment' : 'Order'}${date ? ` dated ${date}` : ''}`;
    const reference = rowReference(row, layout.serialCol, pdfUrl);
    if (reference) description += ` (${reference})`;
  }

  return { date, description, pdfUrl, kind };
}

function extractOrders(tables: TableRow[][], base: string): OrderEntry[] {
  const orders: OrderEntry[] = [];

  for (const rows of tables) {
    const layout = detectOrdersLayout(rows);
    if (!layout) continue;

    for (const row of rows.slice(layout.headerIndex + 1)) {
      if (row.isHeader || row.cells.length < 2) continue;
      const entry = toOrderEntry(row, layout, base);
      if (entry) orders.push(entry);
    }
  }

  return orders;
}

// ============================================
// Parser
// ============================================

const PARTY_RULES: readonly FieldRule[] = FIELD_RULES.filter((rule) => rule.field === 'petitioner' || rule.field === 'respondent');
const DETAIL_RULES: readonly FieldRule[] = FIELD_RULES.filter((rule) =>
  rule.field !== 'title' && !PARTY_RULES.includes(rule));

export class HighCourtResultParser implements CaseResultParser {
  private readonly baseUrl: string | undefined;
  private readonly logger: SearchLogger | undefined;

  constructor(options: ResultParserOptions = {}) {
    this.baseUrl = options.baseUrl;
    this.logger = options.logger;
  }

  detectPage(html: string): PageKind {
    return this.classify(load(html));
  }

  parse(page: ResultPage, query: CaseQuery): CaseRecord {
    const $ = load(page.html);
    const kind = this.classify($);
    const reference = caseKey(query.caseType, query.caseNumber, query.year);

    if (kind === 'not_found') throw new CaseNotFoundError(reference);
    if (kind === 'pending') throw new ParseError('The result page did not finish loading');
    if (kind === 'error') throw new ParseError();

    const values = new Map<string, string | null>();
    for (const rule of FIELD_RULES) {
      const { value, strategy } = extractField($, rule);
      values.set(rule.field, value);
      if (strategy) {
        this.logger?.debug('Field extracted', { field: rule.field, strategy });
      }
    }
    const text = (field: string) => values.get(field) ?? null;

    const orders = extractOrders(snapshotTables($), this.linkBase(page.url));
    this.logger?.debug('Result page parsed', { reference, orders: orders.length });

    return {
      caseType: query.caseType,
      caseNumber: query.caseNumber,
      year: query.year,
      title: text('title'),
      petitioner: text('petitioner'),
      respondent: text('respondent'),
      filingDate: parseLenientDate(text('filingDate')),
      nextHearingDate: parseLenientDate(text('nextHearingDate')),
      status: text('status'),
      bench: text('bench'),
      orders,
    };
  }

  private classify($: CheerioAPI): PageKind {
    const text = cleanText($('body').text() || $.root().text());
    if (!text) return 'pending';

    // parties or orders outweigh error wording; a lone status or bench line does not
    const hasParties = PARTY_RULES.some((rule) => extractField($, rule).value !== null);
    const hasOrders = snapshotTables($).some((rows) => detectOrdersLayout(rows) !== null);
    if (hasParties || hasOrders) return 'result';

    if (NOT_FOUND.test(text)) return 'not_found';
    if (ERROR_PAGE.test(text)) return 'error';
    if (DETAIL_RULES.some((rule) => extractField($, rule).value !== null)) return 'result';
    if ($(SEARCH_FORM).length > 0) return 'pending';
    return 'error';
  }

  private linkBase(pageUrl: string): string {
    if (/^https?:\/\//i.test(pageUrl)) return pageUrl;
    return this.baseUrl ?? DEFAULT_COURT_URL;
  }
}

export function createResultParser(options?: ResultParserOptions): HighCourtResultParser {
  return new HighCourtResultParser(options);
}
