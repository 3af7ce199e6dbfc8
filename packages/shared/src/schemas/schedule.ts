import { z } from 'zod';

import { isoDateSchema } from './catalog.js';

export const SESSION_TYPES = ['learning', 'review_1', 'review_2'] as const;
export type SessionType = (typeof SESSION_TYPES)[number];

export const sessionSchema = z.object({
  course: z.string().min(1),
  topic: z.string().min(1),
  hours: z.number().positive(),
  type: z.enum(SESSION_TYPES),
});

export const scheduleDaySchema = z.object({
  date: isoDateSchema,
  sessions: z.array(sessionSchema),
});

export const scheduleSchema = z.array(scheduleDaySchema);

export type Session = z.infer<typeof sessionSchema>;
export type ScheduleDay = z.infer<typeof scheduleDaySchema>;
export type Schedule = ScheduleDay[];

export function isSessionType(value: string): value is SessionType {
  return (SESSION_TYPES as readonly string[]).includes(value);
}

/**
 * Merges days that share a date, keeping the order in which dates first
 * appear and the order of sessions within them.
 */
export function normalizeSchedule(days: readonly ScheduleDay[]): Schedule {
  const byDate = new Map<string, Session[]>();
  for (const day of days) {
    const sessions = byDate.get(day.date);
    if (sessions) {
      sessions.push(...day.sessions);
    } else {
      byDate.set(day.date, [...day.sessions]);
    }
  }
  return Array.from(byDate, ([date, sessions]) => ({ date, sessions }));
}

export function sortSchedule(schedule: readonly ScheduleDay[]): Schedule {
  return [...schedule].sort((a, b) => a.date.localeCompare(b.date));
}

export interface ScheduleSummary {
  days: number;
  sessions: number;
  hours: number;
}

export function summarizeSchedule(schedule: readonly ScheduleDay[]): ScheduleSummary {
  let sessions = 0;
  let hours = 0;
  for (const day of schedule) {
    sessions += day.sessions.length;
    for (const session of day.sessions) {
      hours += session.hours;
    }
  }
  return { days: schedule.length, sessions, hours: Math.round(hours * 10) / 10 };
}
