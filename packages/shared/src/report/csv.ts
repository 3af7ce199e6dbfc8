import { sortSchedule, type Schedule, type SessionType } from '../schemas/schedule.js';
import { formatIssue, type ScheduleIssue } from '../validation/schedule.js';

export const CSV_COLUMNS = ['Date', 'Course', 'Topic', 'Hours', 'Type', 'Notes'] as const;

export const SESSION_NOTES: Record<SessionType, string> = {
  learning: 'Initial learning session',
  review_1: 'First review (spaced repetition)',
  review_2: 'Final review before exam',
};

export function csvEscape(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Renders a schedule as CSV, one row per session in date order. Remaining
 * validation issues are written above the header as `#` comment lines.
 */
export function formatScheduleCsv(
  schedule: Schedule,
  issues: readonly ScheduleIssue[] = [],
): string {
  const lines: string[] = [];

  if (issues.length > 0) {
    lines.push('# VALIDATION ISSUES:');
    for (const issue of issues) {
      lines.push(`# - ${formatIssue(issue)}`);
    }
    lines.push('#');
  }

  lines.push(CSV_COLUMNS.join(','));
  for (const day of sortSchedule(schedule)) {
    for (const session of day.sessions) {
      lines.push(
        [
          day.date,
          session.course,
          session.topic,
          session.hours,
          session.type,
          SESSION_NOTES[session.type],
        ]
          .map(csvEscape)
          .join(','),
      );
    }
  }

  return `${lines.join('\n')}\n`;
}
