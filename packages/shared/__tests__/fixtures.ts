import type { CourseCatalog, Schedule } from '../src/index.js';

export function buildCatalog(overrides: Partial<CourseCatalog['preferences']> = {}): CourseCatalog {
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
      ...overrides,
    },
  };
}

export function buildValidSchedule(): Schedule {
  return [
    {
      date: '2025-03-01',
      sessions: [{ course: 'CS101', topic: 'T1', hours: 3, type: 'learning' }],
    },
    {
      date: '2025-03-02',
      sessions: [{ course: 'CS101', topic: 'T2', hours: 4, type: 'learning' }],
    },
    {
      date: '2025-03-04',
      sessions: [{ course: 'CS101', topic: 'T1', hours: 1, type: 'review_1' }],
    },
    {
      date: '2025-03-06',
      sessions: [{ course: 'CS101', topic: 'T2', hours: 1, type: 'review_1' }],
    },
    {
      date: '2025-03-08',
      sessions: [{ course: 'CS101', topic: 'T2', hours: 1, type: 'review_2' }],
    },
  ];
}
