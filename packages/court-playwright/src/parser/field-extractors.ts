/**
 * Field extraction strategies.
 *
 * Result pages come in several markup variants. Every field declares an
 * ordered list of strategies; the first one that yields a value wins.
 */

import type { CheerioAPI } from 'cheerio';
import type { CaseField } from '../types/index.js';

export interface FieldExtractor {
  readonly name: string;
  extract($: CheerioAPI, labels: readonly RegExp[]): string | null;
}

export interface FieldRule {
  field: CaseField;
  labels: readonly RegExp[];
  strategies: readonly FieldExtractor[];
}

const LABEL_MAX_LENGTH = 60;
const VERSUS = /\s+(?:vs\.?|v\/s\.?|versus|v\.)\s+/i;

export function cleanText(text: string): string {
  return text.replace(/ /g, ' ').replace(/\s+/g, ' ').trim();
}

function meaningful(value: string): string | null {
  const cleaned = cleanText(value).replace(/^[:\-–\s]+/, '').trim();
  if (!cleaned || /^(?:-+|n\/?a|nil|none)$/i.test(cleaned)) return null;
  return cleaned;
}

function isLabel(text: string, labels: readonly RegExp[]): boolean {
  const cleaned = cleanText(text);
  return cleaned.length > 0 && cleaned.length <= LABEL_MAX_LENGTH && labels.some((re) => re.test(cleaned));
}

/**
 * Builds an anchored label matcher: "next hearing date" matches
 * "Next Hearing Date", "NEXT  HEARING DATE :" and "Next hearing date(s)".
 */
export function label(...phrases: string[]): RegExp {
  const body = phrases
    .map((phrase) => phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\s+/g, '\\s+'))
    .join('|');
  return new RegExp(`^(?:${body})\\s*(?:\\(s\\))?\\s*[:.-]?$`, 'i');
}

// ============================================
// Strategies
// ============================================

/** <tr><td>Label</td><td>Value</td></tr>, also several pairs per row */
export const tableRow: FieldExtractor = {
  name: 'table-row',
  extract($, labels) {
    for (const row of $('tr').toArray()) {
      const cells = $(row).children('td, th').toArray();
      for (let i = 0; i < cells.length - 1; i++) {
        if (!isLabel($(cells[i]).text(), labels)) continue;
        const value = meaningful($(cells[i + 1]).text());
        if (value) return value;
      }
    }
    return null;
  },
};

/** <dt>Label</dt><dd>Value</dd> */
export const definitionList: FieldExtractor = {
  name: 'definition-list',
  extract($, labels) {
    for (const term of $('dt').toArray()) {
      if (!isLabel($(term).text(), labels)) continue;
      const value = meaningful($(term).nextAll('dd').first().text());
      if (value) return value;
    }
    return null;
  },
};

/** <span class="label">Label</span><span class="value">Value</span> */
export const adjacentLabel: FieldExtractor = {
  name: 'adjacent-label',
  extract($, labels) {
    for (const el of $('label, span, strong, b, div, p').toArray()) {
      if (!isLabel($(el).text(), labels)) continue;
      const value = meaningful($(el).next().text());
      if (value) return value;
    }
    return null;
  },
};

/** <p><strong>Label:</strong> Value</p> */
export const inlineLabel: FieldExtractor = {
  name: 'inline-label',
  extract($, labels) {
    let best: string | null = null;
    let bestLength = Infinity;

    for (const el of $('p, li, div, span, td').toArray()) {
      const text = cleanText($(el).text());
      const colon = text.indexOf(':');
      if (colon <= 0 || text.length > 300) continue;
      if (!isLabel(text.slice(0, colon), labels)) continue;

      const value = meaningful(text.slice(colon + 1));
      // the innermost element carrying the pair is the shortest one
      if (value && text.length < bestLength) {
        best = value;
        bestLength = text.length;
      }
    }
    return best;
  },
};

function findTitleText($: CheerioAPI): string | null {
  const candidates = $('.case-title, #case-title, .cause-title, h1, h2, h3, h4').toArray();
  for (const el of candidates) {
    const text = cleanText($(el).text());
    if (text.length > 10 && VERSUS.test(text)) return text;
  }
  const fromTable = tableRow.extract($, TITLE_LABELS);
  if (fromTable && VERSUS.test(fromTable)) return fromTable;
  return null;
}

/** "Case title" from a heading such as "X vs. Y" */
export const headingTitle: FieldExtractor = {
  name: 'heading-title',
  extract($) {
    return findTitleText($);
  },
};

function versusSide(side: 0 | 1): FieldExtractor {
  return {
    name: side === 0 ? 'versus-title-left' : 'versus-title-right',
    extract($) {
      const title = findTitleText($);
      if (!title) return null;
      const parts = title.split(VERSUS);
      if (parts.length !== 2) return null;
      return meaningful(parts[side]);
    },
  };
}

// ============================================
// Field table
// ============================================

const TITLE_LABELS = [label('case title', 'cause title', 'title', 'parties', 'party name')];

export const FIELD_RULES: readonly FieldRule[] = [
  {
    field: 'title',
    labels: TITLE_LABELS,
    strategies: [tableRow, definitionList, adjacentLabel, inlineLabel, headingTitle],
  },
  {
    field: 'petitioner',
    labels: [label('petitioner', 'petitioners', 'petitioner name', 'appellant', 'appellants', 'applicant', 'plaintiff')],
    strategies: [tableRow, definitionList, adjacentLabel, inlineLabel, versusSide(0)],
  },
  {
    field: 'respondent',
    labels: [label('respondent', 'respondents', 'respondent name', 'opposite party', 'defendant')],
    strategies: [tableRow, definitionList, adjacentLabel, inlineLabel, versusSide(1)],
  },
  {
    field: 'filingDate',
    labels: [label('filing date', 'date of filing', 'filed on', 'registration date', 'date of registration', 'registered on')],
    strategies: [tableRow, definitionList, adjacentLabel, inlineLabel],
  },
  {
    field: 'nextHearingDate',
    labels: [label('next date', 'next hearing date', 'next date of hearing', 'next listing date', 'next hearing', 'nhd')],
    strategies: [tableRow, definitionList, adjacentLabel, inlineLabel],
  },
  {
    field: 'status',
    labels: [label('status', 'case status', 'current status', 'stage', 'case stage', 'current stage')],
    strategies: [tableRow, definitionList, adjacentLabel, inlineLabel],
  },
  {
    field: 'bench',
    labels: [label('bench', 'coram', 'judge', 'judges', 'before', "hon'ble judge", "hon'ble judges", 'court no', 'court number')],
    strategies: [tableRow, definitionList, adjacentLabel, inlineLabel],
  },
];

export interface ExtractedField {
  value: string | null;
  /** Strategy that produced the value, null when none did */
  strategy: string | null;
}

export function extractField($: CheerioAPI, rule: FieldRule): ExtractedField {
  for (const strategy of rule.strategies) {
    const value = strategy.extract($, rule.labels);
    if (value) return { value, strategy: strategy.name };
  }
  return { value: null, strategy: null };
}
