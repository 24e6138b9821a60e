/**
 * Calendar helpers for trade dates
 *
 * Trade dates are plain calendar days carried as ISO strings (YYYY-MM-DD),
 * which compare correctly as strings. Weekday arithmetic runs in UTC so the
 * server time zone never shifts a day; only "today" is read from the local
 * clock.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function fromUtc(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

function toUtc(isoDate: string): Date {
  const [year, month, day] = isoDate.split('-').map(Number);
  return new Date(Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1));
}

/**
 * Local calendar day of a timestamp
 */
export function toIsoDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

/**
 * Strict parse: returns the normalized date, or null when the value is not
 * an existing calendar day (e.g. "2024-02-30", "10/01/2024", "").
 */
export function parseTradeDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;

  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return fromUtc(date);
}

/**
 * ISO weekday: Monday = 1 … Sunday = 7
 */
export function isoWeekday(isoDate: string): number {
  const day = toUtc(isoDate).getUTCDay();
  return day === 0 ? 7 : day;
}

export function isWeekend(isoDate: string): boolean {
  return isoWeekday(isoDate) >= 6;
}

export function addDays(isoDate: string, days: number): string {
  return fromUtc(new Date(toUtc(isoDate).getTime() + days * MS_PER_DAY));
}

/**
 * Latest tradable day as of `now`: today, or the preceding Friday when
 * today falls on a weekend. Also the default trade date of a new entry.
 */
export function defaultTradeDate(now: Date = new Date()): string {
  const today = toIsoDate(now);
  switch (isoWeekday(today)) {
    case 6:
      return addDays(today, -1);
    case 7:
      return addDays(today, -2);
    default:
      return today;
  }
}
