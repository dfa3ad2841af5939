/**
 * Date utility functions
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Days at the start of a year during which the previous year is scanned too.
 * Invoices for late-December orders are often issued in January.
 */
export const YEAR_TRANSITION_GRACE_DAYS = 56;

/**
 * Month names as shown on German and English storefront pages, matched by prefix
 */
const MONTH_PREFIXES: ReadonlyArray<readonly string[]> = [
  ['jan'],
  ['feb'],
  ['mär', 'mar', 'mrz'],
  ['apr'],
  ['mai', 'may'],
  ['jun'],
  ['jul'],
  ['aug'],
  ['sep'],
  ['okt', 'oct'],
  ['nov'],
  ['dez', 'dec'],
];

/**
 * Format date to YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Format date to YYYYMMDD (used in file names)
 */
export function formatCompactDate(date: Date): string {
  return formatDate(date).replace(/-/g, '');
}

/**
 * Zero-based index of the day within its calendar year (1 January is 0)
 */
export function dayOfYearIndex(date: Date): number {
  const start = Date.UTC(date.getFullYear(), 0, 1);
  const current = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
  return Math.round((current - start) / MS_PER_DAY);
}

/**
 * Years whose order history must be scanned, ascending.
 *
 * Without a floor this is the current year, plus the previous one while `now`
 * falls within the first {@link YEAR_TRANSITION_GRACE_DAYS} days of the year.
 * With a floor it is every year from the floor through the current year; the
 * look-back never goes below the floor.
 */
export function getYearsToCheck(now: Date, minYear?: number): number[] {
  const currentYear = now.getFullYear();

  if (minYear === undefined) {
    if (dayOfYearIndex(now) < YEAR_TRANSITION_GRACE_DAYS) {
      return [currentYear - 1, currentYear];
    }
    return [currentYear];
  }

  const years: number[] = [];
  for (let year = minYear; year <= currentYear; year++) {
    years.push(year);
  }
  return years;
}

function monthFromName(name: string): number | undefined {
  const prefix = name.toLowerCase().slice(0, 3);
  const index = MONTH_PREFIXES.findIndex(prefixes => prefixes.includes(prefix));
  return index === -1 ? undefined : index;
}

function buildDate(year: number, monthIndex: number, day: number): Date | null {
  const date = new Date(year, monthIndex, day);
  if (date.getFullYear() !== year || date.getMonth() !== monthIndex || date.getDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parse an order date as displayed on an order card.
 * Accepts "30. Dezember 2024", "30 December 2024", "December 30, 2024" and "30.12.2024".
 */
export function parseOrderDate(text: string): Date | null {
  const value = text.trim();

  const numeric = value.match(/(\d{1,2})\.(\d{1,2})\.(\d{4})/);
  if (numeric) {
    return buildDate(Number(numeric[3]), Number(numeric[2]) - 1, Number(numeric[1]));
  }

  const dayFirst = value.match(/(\d{1,2})\.?\s+([A-Za-zÄÖÜäöü]+)\.?\s+(\d{4})/);
  if (dayFirst) {
    const month = monthFromName(dayFirst[2]);
    if (month !== undefined) {
      return buildDate(Number(dayFirst[3]), month, Number(dayFirst[1]));
    }
  }

  const monthFirst = value.match(/([A-Za-zÄÖÜäöü]+)\.?\s+(\d{1,2}),?\s+(\d{4})/);
  if (monthFirst) {
    const month = monthFromName(monthFirst[1]);
    if (month !== undefined) {
      return buildDate(Number(monthFirst[3]), month, Number(monthFirst[2]));
    }
  }

  return null;
}

/**
 * Whether `date` lies more than `days` whole days before `now`
 */
export function isOlderThanDays(date: Date, days: number, now: Date): boolean {
  return (now.getTime() - date.getTime()) / MS_PER_DAY > days;
}
