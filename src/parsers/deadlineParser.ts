/**
 * Deadline normalizer - runs after LLM extraction
 * Guarantees a committed deadline is never before the day the request was made
 */

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

const ISO_DATE = /^\s*(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s].*)?$/;

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function parseIsoDate(raw: string): CalendarDate | null {
  const match = raw.match(ISO_DATE);
  if (!match) return null;

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

function clamped(year: number, month: number, day: number): CalendarDate {
  return { year, month, day: Math.min(day, daysInMonth(year, month)) };
}

function compare(a: CalendarDate, b: CalendarDate): number {
  return (a.year - b.year) || (a.month - b.month) || (a.day - b.day);
}

export function formatIsoDate(date: CalendarDate): string {
  const mm = String(date.month).padStart(2, '0');
  const dd = String(date.day).padStart(2, '0');
  return `${date.year}-${mm}-${dd}`;
}

/**
 * Same month/day in the reference year, or the year after if that already passed
 */
function nextOccurrence(parsed: CalendarDate, reference: CalendarDate): CalendarDate {
  const thisYear = clamped(reference.year, parsed.month, parsed.day);
  if (compare(thisYear, reference) < 0) {
    return clamped(reference.year + 1, parsed.month, parsed.day);
  }
  return thisYear;
}

/**
 * Normalize an extracted deadline against the date the thread was opened.
 *
 * - null stays null
 * - anything that is not a calendar date is returned untouched
 * - past years and implausibly far years are moved to the next occurrence
 * - a date earlier this year rolls to next year; next year is kept
 */
export function normalizeDeadline(rawDate: string | null | undefined, referenceDatetime: Date): string | null {
  if (rawDate === null || rawDate === undefined) return null;

  const parsed = parseIsoDate(rawDate);
  if (!parsed) {
    console.warn(`[deadline] Could not parse "${rawDate}", keeping it as-is`);
    return rawDate;
  }

  const reference: CalendarDate = {
    year: referenceDatetime.getUTCFullYear(),
    month: referenceDatetime.getUTCMonth() + 1,
    day: referenceDatetime.getUTCDate()
  };

  let corrected: CalendarDate;

  if (parsed.year < reference.year) {
    corrected = nextOccurrence(parsed, reference);
  } else if (parsed.year === reference.year) {
    corrected = compare(parsed, reference) < 0
      ? clamped(reference.year + 1, parsed.month, parsed.day)
      : parsed;
  } else if (parsed.year === reference.year + 1) {
    corrected = parsed;
  } else {
    console.warn(`[deadline] Year ${parsed.year} is too far out, assuming an extraction error`);
    corrected = nextOccurrence(parsed, reference);
  }

  return formatIsoDate(corrected);
}
