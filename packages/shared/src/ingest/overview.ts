import { isValid, parse } from 'date-fns';

import { toIsoDate } from '../dates.js';

const MIDTERM_DATE_FORMATS = ['MMMM d, yyyy', 'MMM d, yyyy', 'yyyy-MM-dd', 'MM/dd/yyyy'];

/** Reads the exam date from a `Date: ...` line of an exam overview sheet. */
export function parseMidtermDate(text: string): string | null {
  const match = text.match(/Date:\s*(.+)/);
  if (!match) {
    return null;
  }
  const raw = match[1].trim();
  for (const pattern of MIDTERM_DATE_FORMATS) {
    const parsed = parse(raw, pattern, new Date());
    if (isValid(parsed)) {
      return toIsoDate(parsed);
    }
  }
  return null;
}

/** Chapter numbers listed on a `Coverage: Chapters ...` line. */
export function parseMidtermChapters(text: string): string[] {
  const match = text.match(/Coverage:\s*Chapters?\s*(.+)/i);
  if (!match) {
    return [];
  }
  return match[1].match(/\d+/g) ?? [];
}
