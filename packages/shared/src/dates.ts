import { addDays, differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

export function toIsoDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}

export function parseIsoDate(value: string): Date {
  const parsed = parseISO(value);
  if (!isValid(parsed)) {
    throw new RangeError(`Invalid calendar date "${value}"`);
  }
  return parsed;
}

export function shiftIsoDate(value: string, days: number): string {
  return toIsoDate(addDays(parseIsoDate(value), days));
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseIsoDate(to), parseIsoDate(from));
}

export function weekdayName(value: string): string {
  return format(parseIsoDate(value), 'EEEE');
}

/**
 * Every date from `startInclusive` up to `endExclusive`, skipping weekdays
 * named in `restDays` (compared case-insensitively).
 */
export function listStudyDates(
  startInclusive: string,
  endExclusive: string,
  restDays: readonly string[],
): string[] {
  const rest = new Set(restDays.map((day) => day.trim().toLowerCase()));
  const dates: string[] = [];
  for (let current = startInclusive; current < endExclusive; current = shiftIsoDate(current, 1)) {
    if (!rest.has(weekdayName(current).toLowerCase())) {
      dates.push(current);
    }
  }
  return dates;
}
