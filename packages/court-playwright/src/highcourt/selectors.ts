/**
 * Semantic ARIA selectors for the High Court case-status form
 */

import type { ChallengeSelectors, SearchFormSelectors } from '../types/index.js';
import { DEFAULT_COURT_URL } from './catalogue.js';

export const HIGHCOURT_URLS = {
  base: DEFAULT_COURT_URL,
  caseStatus: `${DEFAULT_COURT_URL}get-case-type-status`,
} as const;

export const HIGHCOURT_FORM_SELECTORS: SearchFormSelectors = {
  caseTypeSelect: {
    role: 'combobox',
    name: /case\s*type/i,
    fallback: 'select[name="case_type"], #case_type',
  },
  caseNumberInput: {
    role: 'textbox',
    name: /case\s*(no|number)/i,
    fallback: 'input[name="case_number"], #case_number',
  },
  yearSelect: {
    role: 'combobox',
    name: /year/i,
    fallback: 'select[name="year"], #year, #case_year',
  },
  submitBtn: {
    role: 'button',
    name: /submit|search|go/i,
    fallback: 'input[type="submit"], button[type="submit"], #search',
  },
};

export const HIGHCOURT_CHALLENGE_SELECTORS: ChallengeSelectors = {
  image: 'img[src*="captcha" i], img[id*="captcha" i], img[class*="captcha" i]',
  text: '#captcha-code, .captcha-code, span[id*="captcha" i], div[id*="captcha" i] > span',
  input: 'input[name="captcha"], input[name*="captcha" i], input[id*="captcha" i], input[placeholder*="captcha" i]',
  refreshBtn: '[class*="refresh"], [id*="refresh" i], a[title*="refresh" i], button[title*="refresh" i]',
  submitBtn: 'input[type="submit"], button[type="submit"], #search',
};
