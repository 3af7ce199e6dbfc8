import { vi } from 'vitest';

import type { CourseCatalog, Schedule } from '@studyplan/shared';

import type { Logger } from '../logger.js';
import type { OracleRequest } from '../oracle.js';
import type { StageDependencies } from '../stages/common.js';

export const TODAY = '2025-02-27';

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** An oracle that answers with the given responses in order. */
export function scriptedOracle(...responses: string[]) {
  const generate = vi.fn(async (request: OracleRequest): Promise<string> => {
    throw new Error(`No scripted response left for ${request.stage}`);
  });
  for (const response of responses) {
    generate.mockResolvedValueOnce(response);
  }
  return { generate };
}

export function buildDeps(oracle: StageDependencies['oracle']): StageDependencies {
  return {
    oracle,
    logger: silentLogger(),
    now: () => new Date(2025, 1, 27),
  };
}

export function buildCatalog(): CourseCatalog {
  return {
    courses: {
      CS101: {
        code: 'CS101',
        midterm_date: '2025-03-10',
        midterm_weight: 30,
        topics: [
          { name: 'T1', chapters: ['1'], pages: 30 },
          { name: 'T2', chapters: ['2'], pages: 50 },
        ],
        total_pages: 80,
      },
    },
    preferences: {
      max_hours_per_day: 6,
      preferred_study_times: ['morning'],
      rest_days: [],
      study_style: 'spaced_repetition',
    },
  };
}

export function buildTwoCourseCatalog(): CourseCatalog {
  const catalog = buildCatalog();
  return {
    ...catalog,
    courses: {
      ...catalog.courses,
      CS102: {
        code: 'CS102',
        midterm_date: '2025-03-14',
        midterm_weight: 25,
        topics: [{ name: 'Graphs', chapters: ['5'], pages: 42 }],
        total_pages: 42,
      },
      HIST100: {
        code: 'HIST100',
        midterm_date: null,
        midterm_weight: 0,
        topics: [{ name: 'Rome', chapters: [], pages: 12 }],
        total_pages: 12,
      },
    },
  };
}

/** Two courses holding `first + second` topics in total. */
export function buildLargeCatalog(first: number, second: number): CourseCatalog {
  const topics = (prefix: string, count: number) =>
    Array.from({ length: count }, (_, index) => ({
      name: `${prefix} ${index + 1}`,
      chapters: [String(index + 1)],
      pages: 10 + index,
    }));
  return {
    courses: {
      BIO200: {
        code: 'BIO200',
        midterm_date: '2025-03-20',
        midterm_weight: 40,
        topics: topics('Cell', first),
        total_pages: 0,
      },
      CHEM150: {
        code: 'CHEM150',
        midterm_date: '2025-03-24',
        midterm_weight: 20,
        topics: topics('Bond', second),
        total_pages: 0,
      },
    },
    preferences: {
      max_hours_per_day: null,
      preferred_study_times: ['evening'],
      rest_days: [],
      study_style: 'balanced',
    },
  };
}

/** A schedule for `buildCatalog()` that passes validation without issues. */
export function buildValidSchedule(): Schedule {
  return [
    { date: '2025-03-01', sessions: [{ course: 'CS101', topic: 'T1', hours: 3, type: 'learning' }] },
    { date: '2025-03-02', sessions: [{ course: 'CS101', topic: 'T2', hours: 4, type: 'learning' }] },
    { date: '2025-03-04', sessions: [{ course: 'CS101', topic: 'T1', hours: 1, type: 'review_1' }] },
    { date: '2025-03-06', sessions: [{ course: 'CS101', topic: 'T2', hours: 1, type: 'review_1' }] },
    { date: '2025-03-08', sessions: [{ course: 'CS101', topic: 'T2', hours: 1, type: 'review_2' }] },
  ];
}

export const RANKING_RESPONSE = JSON.stringify({
  course_priorities: { CS101: { priority_score: 9, reasoning: 'Exam in 11 days.' } },
});
