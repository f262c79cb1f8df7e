import { describe, it, expect } from 'vitest';
import { validateQuery } from '../src/core/validation.js';
import { ValidationError } from '../src/core/errors.js';
import { caseKey, getCaseTypes, getCaseYears, isKnownCaseType } from '../src/highcourt/catalogue.js';

const now = new Date('2025-06-01T00:00:00Z');

function issuesOf(input: unknown): string[] {
  try {
    validateQuery(input, { now });
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  return [];
}

describe('validateQuery', () => {
  it('should normalize a valid query', () => {
    const query = validateQuery(
      { caseType: ' w.p.(c) ', caseNumber: '001234', year: 2023, captchaCode: ' AB12 ' },
      { now },
    );

    expect(query).toEqual({ caseType: 'W.P.(C)', caseNumber: '1234', year: 2023, captchaCode: 'AB12' });
  });

  it('should map a blank captcha code to null', () => {
    const query = validateQuery({ caseType: 'CRL.A.', caseNumber: '7', year: 2020, captchaCode: '  ' }, { now });
    expect(query.captchaCode).toBeNull();
  });

  it('should reject a non-numeric case number', () => {
    expect(issuesOf({ caseType: 'W.P.(C)', caseNumber: '12A4', year: 2023 })).toEqual(['case number must be numeric']);
  });

  it('should reject years outside the range the court offers', () => {
    expect(issuesOf({ caseType: 'W.P.(C)', caseNumber: '1', year: 1950 })).toEqual(['year must be 1951 or later']);
    expect(issuesOf({ caseType: 'W.P.(C)', caseNumber: '1', year: 2026 })).toEqual(['year must be 2025 or earlier']);
  });

  it('should reject case types the court does not list', () => {
    expect(issuesOf({ caseType: 'NOT.A.TYPE', caseNumber: '1', year: 2023 }))
      .toEqual(['case type is not offered by the court']);
  });

  it('should accept unlisted case types when strict checking is off', () => {
    const query = validateQuery(
      { caseType: 'new.type', caseNumber: '1', year: 2023 },
      { now, strictCaseTypes: false },
    );
    expect(query.caseType).toBe('NEW.TYPE');
  });

  it('should list every problem at once', () => {
    expect(issuesOf({ caseType: '', caseNumber: '', year: 'x' })).toEqual(expect.arrayContaining([
      'case type is required',
      'case number is required',
      'year must be a number',
    ]));
  });
});

describe('catalogue', () => {
  it('should load the case types from the data file', () => {
    const types = getCaseTypes();
    expect(types).toContain('W.P.(C)');
    expect(types).toContain('CRL.A.');
    expect(isKnownCaseType('cs(comm)')).toBe(true);
  });

  it('should list years newest first down to 1951', () => {
    const years = getCaseYears(now);
    expect(years[0]).toBe(2025);
    expect(years[years.length - 1]).toBe(1951);
    expect(years).toHaveLength(75);
  });

  it('should build the natural key of a case', () => {
    expect(caseKey('w.p.(c)', '0042', 2023)).toBe('W.P.(C)/42/2023');
  });
});
