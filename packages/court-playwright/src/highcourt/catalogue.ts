/**
 * Court catalogue: case types and the searchable year range
 */

import { readFileSync } from 'fs';

export const DEFAULT_COURT_URL = 'https://delhihighcourt.nic.in/app/';

/** First year the case-status form offers */
export const FIRST_CASE_YEAR = 1951;

let caseTypes: readonly string[] | null = null;

function loadCaseTypes(): readonly string[] {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../data/case-types.json', import.meta.url), 'utf-8'));
  if (!Array.isArray(raw)) {
    throw new Error('case-types.json must contain an array');
  }
  return Object.freeze(raw.filter((item): item is string => typeof item === 'string'));
}

export function getCaseTypes(): readonly string[] {
  if (!caseTypes) caseTypes = loadCaseTypes();
  return caseTypes;
}

/** Uppercase, trimmed, single-spaced form of a case type */
export function normalizeCaseType(caseType: string): string {
  return caseType.trim().replace(/\s+/g, ' ').toUpperCase();
}

export function isKnownCaseType(caseType: string): boolean {
  const normalized = normalizeCaseType(caseType);
  return getCaseTypes().some((known) => normalizeCaseType(known) === normalized);
}

/** Years offered by the form, newest first */
export function getCaseYears(now: Date = new Date()): number[] {
  const years: number[] = [];
  for (let year = now.getFullYear(); year >= FIRST_CASE_YEAR; year--) {
    years.push(year);
  }
  return years;
}

/** "00123" -> "123" */
export function normalizeCaseNumber(caseNumber: string): string {
  return caseNumber.trim().replace(/^0+(?=\d)/, '');
}

/**
 * Natural key of a case: "<CASE TYPE>/<number>/<year>", e.g. "W.P.(C)/1234/2023".
 */
export function caseKey(caseType: string, caseNumber: string, year: number): string {
  return `${normalizeCaseType(caseType)}/${normalizeCaseNumber(caseNumber)}/${year}`;
}
