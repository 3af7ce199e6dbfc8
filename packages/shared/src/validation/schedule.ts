import { daysBetween } from '../dates.js';
import { eligibleCourses, type CourseCatalog } from '../schemas/catalog.js';
import { sortSchedule, type Schedule } from '../schemas/schedule.js';

/** Hard ceiling on study hours per day, independent of user preferences. */
export const MAX_DAILY_HOURS = 8;
export const MAX_GAP_BEFORE_EXAM_DAYS = 3;
export const MIN_REVIEW_GAP_DAYS = 2;
export const MAX_REVIEW_GAP_DAYS = 7;

export type IssueKind = 'ERROR' | 'WARNING';
export type IssueRule = 'daily_load' | 'coverage' | 'deadline' | 'spacing';

export interface IssueContext {
  course?: string;
  topic?: string;
  date?: string;
  dates?: string[];
  topics?: string[];
}

export interface ScheduleIssue {
  kind: IssueKind;
  rule: IssueRule;
  message: string;
  context: IssueContext;
}

export function formatIssue(issue: ScheduleIssue): string {
  return `${issue.kind}: ${issue.message}`;
}

export function partitionIssues(issues: readonly ScheduleIssue[]): {
  errors: ScheduleIssue[];
  warnings: ScheduleIssue[];
} {
  return {
    errors: issues.filter((issue) => issue.kind === 'ERROR'),
    warnings: issues.filter((issue) => issue.kind === 'WARNING'),
  };
}

function roundHours(hours: number): number {
  return Math.round(hours * 100) / 100;
}

function checkDailyLoad(catalog: CourseCatalog, schedule: Schedule): ScheduleIssue[] {
  const issues: ScheduleIssue[] = [];
  const preferred = catalog.preferences.max_hours_per_day;

  for (const day of schedule) {
    const total = roundHours(day.sessions.reduce((sum, session) => sum + session.hours, 0));
    if (total > MAX_DAILY_HOURS) {
      issues.push({
        kind: 'ERROR',
        rule: 'daily_load',
        message: `Day ${day.date} has ${total} hours (exceeds ${MAX_DAILY_HOURS} hour maximum)`,
        context: { date: day.date },
      });
    } else if (preferred !== null && total > preferred) {
      issues.push({
        kind: 'WARNING',
        rule: 'daily_load',
        message: `Day ${day.date} has ${total} hours (exceeds user preference of ${preferred} hours)`,
        context: { date: day.date },
      });
    }
  }
  return issues;
}

function checkTopicCoverage(catalog: CourseCatalog, schedule: Schedule): ScheduleIssue[] {
  const learned = new Map<string, Set<string>>();
  for (const day of schedule) {
    for (const session of day.sessions) {
      if (session.type !== 'learning') continue;
      const topics = learned.get(session.course) ?? new Set<string>();
      topics.add(session.topic);
      learned.set(session.course, topics);
    }
  }

  const issues: ScheduleIssue[] = [];
  for (const course of eligibleCourses(catalog)) {
    const found = learned.get(course.code) ?? new Set<string>();
    const missing = course.topics.map((topic) => topic.name).filter((name) => !found.has(name));
    if (missing.length > 0) {
      issues.push({
        kind: 'ERROR',
        rule: 'coverage',
        message: `Course ${course.code} missing topics: ${missing.join(', ')}`,
        context: { course: course.code, topics: missing },
      });
    }
  }
  return issues;
}

function checkDeadlines(catalog: CourseCatalog, schedule: Schedule): ScheduleIssue[] {
  const courseDates = new Map<string, string[]>();
  for (const day of schedule) {
    for (const session of day.sessions) {
      const dates = courseDates.get(session.course) ?? [];
      dates.push(day.date);
      courseDates.set(session.course, dates);
    }
  }

  const issues: ScheduleIssue[] = [];
  for (const course of eligibleCourses(catalog)) {
    const dates = courseDates.get(course.code) ?? [];
    const exam = course.midterm_date;

    const late = Array.from(new Set(dates.filter((date) => date >= exam))).sort();
    if (late.length > 0) {
      issues.push({
        kind: 'ERROR',
        rule: 'deadline',
        message: `Course ${course.code} has study sessions on/after exam date (${exam}): ${late.join(', ')}`,
        context: { course: course.code, dates: late },
      });
    }

    const before = dates.filter((date) => date < exam).sort();
    const last = before[before.length - 1];
    if (last !== undefined) {
      const gap = daysBetween(last, exam);
      if (gap > MAX_GAP_BEFORE_EXAM_DAYS) {
        issues.push({
          kind: 'WARNING',
          rule: 'deadline',
          message: `Last study session for ${course.code} is ${gap} days before exam (${exam})`,
          context: { course: course.code, date: last },
        });
      }
    }
  }
  return issues;
}

function checkSpacing(catalog: CourseCatalog, schedule: Schedule): ScheduleIssue[] {
  const issues: ScheduleIssue[] = [];
  const ordered = sortSchedule(schedule);

  for (const course of eligibleCourses(catalog)) {
    for (const topic of course.topics) {
      const learning: string[] = [];
      const reviews: string[] = [];
      for (const day of ordered) {
        for (const session of day.sessions) {
          if (session.course !== course.code || session.topic !== topic.name) continue;
          (session.type === 'learning' ? learning : reviews).push(day.date);
        }
      }

      const context = { course: course.code, topic: topic.name };
      const label = `"${topic.name}" (${course.code})`;

      if (learning.length === 0) {
        issues.push({
          kind: 'ERROR',
          rule: 'spacing',
          message: `Topic ${label} has no learning session`,
          context,
        });
        continue;
      }

      if (reviews.length === 0) {
        issues.push({
          kind: 'WARNING',
          rule: 'spacing',
          message: `Topic ${label} has no review sessions (no spaced repetition)`,
          context,
        });
        continue;
      }

      const gap = daysBetween(learning[0], reviews[0]);
      if (gap < MIN_REVIEW_GAP_DAYS) {
        issues.push({
          kind: 'WARNING',
          rule: 'spacing',
          message: `Review too soon for ${label} (${gap} day(s) after learning, expected >= ${MIN_REVIEW_GAP_DAYS})`,
          context: { ...context, date: reviews[0] },
        });
      } else if (gap > MAX_REVIEW_GAP_DAYS) {
        issues.push({
          kind: 'WARNING',
          rule: 'spacing',
          message: `Review too late for ${label} (${gap} days after learning, expected <= ${MAX_REVIEW_GAP_DAYS})`,
          context: { ...context, date: reviews[0] },
        });
      }
    }
  }
  return issues;
}

/**
 * Runs every rule family against a candidate schedule. Pure: the same
 * inputs always give the same issues in the same order.
 */
export function validateSchedule(catalog: CourseCatalog, schedule: Schedule): ScheduleIssue[] {
  const ordered = sortSchedule(schedule);
  return [
    ...checkDailyLoad(catalog, ordered),
    ...checkTopicCoverage(catalog, ordered),
    ...checkDeadlines(catalog, ordered),
    ...checkSpacing(catalog, ordered),
  ];
}
