/**
 * Lenient date parsing for court pages.
 *
 * Court pages mix "01-05-2023", "1/5/23", "01.05.2023", "2023-05-01",
 * "1 May 2023" and "May 1, 2023". Numeric dates are day-first.
 */

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const ISO = /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/;
const DAY_FIRST = /\b(\d{1,2})[-/.](\d{1,2})[-/.](\d{4}|\d{2})\b/;
const DAY_MONTH_NAME = /\b(\d{1,2})(?:st|nd|rd|th)?[\s-]+([A-Za-z]{3,9})\.?,?[\s-]+(\d{4})\b/;
const MONTH_NAME_DAY = /\b([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})\b/;

/** Any date-looking fragment, used to pick the date cell of a row */
export const DATE_FRAGMENT = /\b\d{1,2}[-/.]\d{1,2}[-/.]\d{2,4}\b|\b\d{4}-\d{1,2}-\d{1,2}\b|\b\d{1,2}(?:st|nd|rd|th)?[\s-]+[A-Za-z]{3,9}\.?,?[\s-]+\d{4}\b/;

function expandYear(year: string): number {
  const value = Number(year);
  if (year.length === 4) return value;
  // two-digit years: 00-50 => 2000s, 51-99 => 1900s
  return value <= 50 ? 2000 + value : 1900 + value;
}

function monthFromName(name: string): number | null {
  return MONTHS[name.slice(0, 3).toLowerCase()] ?? null;
}

function toIso(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

/**
 * Returns the first date found in `text` as YYYY-MM-DD, or null.
 */
export function parseLenientDate(text: string | null | undefined): string | null {
  if (!text) return null;
  const value = text.trim();
  if (!value) return null;

  const iso = ISO.exec(value);
  if (iso) return toIso(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const dayFirst = DAY_FIRST.exec(value);
  if (dayFirst) return toIso(expandYear(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));

  const dayMonth = DAY_MONTH_NAME.exec(value);
  if (dayMonth) {
    const month = monthFromName(dayMonth[2]);
    if (month) return toIso(Number(dayMonth[3]), month, Number(dayMonth[1]));
  }

  const monthDay = MONTH_NAME_DAY.exec(value);
  if (monthDay) {
    const month = monthFromName(monthDay[1]);
    if (month) return toIso(Number(monthDay[3]), month, Number(monthDay[2]));
  }

  return null;
}
