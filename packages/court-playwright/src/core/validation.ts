/**
 * Validation of search requests (runs before any network interaction)
 */

import { z } from 'zod';
import type { CaseQuery } from '../types/index.js';
import { FIRST_CASE_YEAR, isKnownCaseType, normalizeCaseNumber, normalizeCaseType } from '../highcourt/catalogue.js';
import { ValidationError } from './errors.js';

export interface ValidationOptions {
  /** Accept only case types from the catalogue (default: true) */
  strictCaseTypes?: boolean;
  now?: Date;
}

function buildSchema(options: ValidationOptions) {
  const strict = options.strictCaseTypes ?? true;
  const maxYear = (options.now ?? new Date()).getFullYear();

  return z.object({
    caseType: z
      .string({ required_error: 'case type is required' })
      .trim()
      .min(1, 'case type is required')
      .max(40, 'case type is too long')
      .refine((value) => !strict || isKnownCaseType(value), 'case type is not offered by the court')
      .transform(normalizeCaseType),
    caseNumber: z
      .string({ required_error: 'case number is required' })
      .trim()
      .min(1, 'case number is required')
      .regex(/^\d{1,10}$/, 'case number must be numeric')
      .transform(normalizeCaseNumber),
    year: z
      .number({ required_error: 'year is required', invalid_type_error: 'year must be a number' })
      .int('year must be an integer')
      .min(FIRST_CASE_YEAR, `year must be ${FIRST_CASE_YEAR} or later`)
      .max(maxYear, `year must be ${maxYear} or earlier`),
    captchaCode: z
      .string()
      .trim()
      .max(32, 'captcha code is too long')
      .nullish()
      .transform((value) => (value ? value : null)),
  });
}

/**
 * Returns the normalized query or throws ValidationError listing every problem.
 */
export function validateQuery(input: unknown, options: ValidationOptions = {}): CaseQuery {
  const parsed = buildSchema(options).safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => issue.message));
  }
  return parsed.data;
}
