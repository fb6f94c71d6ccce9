/**
 * Calendar-date helpers.
 *
 * Dates travel through the engine as ISO `YYYY-MM-DD` strings, so ordering is
 * plain string comparison and nothing depends on the host time zone once a
 * value has been parsed.
 */

export type CalendarDate = string;

const MS_PER_DAY = 1000 * 60 * 60 * 24;

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const MONTH_ABBREVIATIONS: ReadonlyMap<string, number> = new Map(
  MONTH_NAMES.map((name, index) => [name.slice(0, 3).toLowerCase(), index + 1])
);

const ISO_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s].*)?$/;
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
// Order export format, e.g. "21 Feb 2026 11:57 pm"
const EXPORT_PATTERN = /^(\d{1,2})\s+([A-Za-z]{3,9})\.?\s+(\d{4})(?:\s+.*)?$/;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  const utc = new Date(Date.UTC(year, month - 1, day));
  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day
  ) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function toUtcMillis(date: CalendarDate): number {
  const [year, month, day] = date.split('-').map(Number);
  return Date.UTC(year, month - 1, day);
}

/**
 * Parses a calendar date from a Date object or one of the supported string
 * forms: YYYY-MM-DD (time part ignored), MM/DD/YYYY, "21 Feb 2026 11:57 pm".
 * Date objects are read in local time.
 *
 * @returns ISO calendar date, or null when the value is not a real date
 */
export function parseCalendarDate(value: unknown): CalendarDate | null {
  if (value instanceof Date) {
    if (isNaN(value.getTime())) {
      return null;
    }
    return toCalendarDate(value.getFullYear(), value.getMonth() + 1, value.getDate());
  }

  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }

  const trimmed = value.trim();

  const iso = trimmed.match(ISO_PATTERN);
  if (iso) {
    return toCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = trimmed.match(US_PATTERN);
  if (us) {
    return toCalendarDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  const exported = trimmed.match(EXPORT_PATTERN);
  if (exported) {
    const month = MONTH_ABBREVIATIONS.get(exported[2].slice(0, 3).toLowerCase());
    if (month === undefined) {
      return null;
    }
    return toCalendarDate(Number(exported[3]), month, Number(exported[1]));
  }

  return null;
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(toUtcMillis(date) + days * MS_PER_DAY);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(
    shifted.getUTCDate()
  )}`;
}

/**
 * Every day from start to end, both inclusive. Empty when start > end.
 */
export function enumerateDays(start: CalendarDate, end: CalendarDate): CalendarDate[] {
  const days: CalendarDate[] = [];
  for (let day = start; day <= end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

/**
 * Day of week with Sunday as 0.
 */
export function dayOfWeek(date: CalendarDate): number {
  return new Date(toUtcMillis(date)).getUTCDay();
}

/**
 * 1-based week of the month: days 1-7 are week 1, 8-14 week 2, and so on.
 */
export function weekOfMonth(date: CalendarDate): number {
  const day = Number(date.slice(8, 10));
  return Math.floor((day - 1) / 7) + 1;
}

export function monthName(date: CalendarDate): string {
  return MONTH_NAMES[Number(date.slice(5, 7)) - 1];
}
