import { describe, it, expect } from 'vitest';
import { parseLenientDate } from '../src/parser/dates.js';

describe('parseLenientDate', () => {
  it('should read day-first numeric dates with any separator', () => {
    expect(parseLenientDate('01-05-2023')).toBe('2023-05-01');
    expect(parseLenientDate('1/5/2023')).toBe('2023-05-01');
    expect(parseLenientDate('01.05.2023')).toBe('2023-05-01');
  });

  it('should expand two-digit years', () => {
    expect(parseLenientDate('01/05/23')).toBe('2023-05-01');
    expect(parseLenientDate('01/05/98')).toBe('1998-05-01');
  });

  it('should keep ISO dates', () => {
    expect(parseLenientDate('2023-05-01')).toBe('2023-05-01');
  });

  it('should read month names', () => {
    expect(parseLenientDate('1st May, 2023')).toBe('2023-05-01');
    expect(parseLenientDate('12 January 2024')).toBe('2024-01-12');
    expect(parseLenientDate('May 1, 2023')).toBe('2023-05-01');
  });

  it('should find the date inside surrounding text', () => {
    expect(parseLenientDate('Listed on 14-08-2024 (tentative)')).toBe('2024-08-14');
  });

  it('should return null for impossible or missing dates', () => {
    expect(parseLenientDate('31-02-2023')).toBeNull();
    expect(parseLenientDate('to be notified')).toBeNull();
    expect(parseLenientDate('')).toBeNull();
    expect(parseLenientDate(null)).toBeNull();
  });
});
