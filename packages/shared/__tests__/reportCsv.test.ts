import { describe, expect, it } from 'vitest';

import { formatScheduleCsv, validateSchedule, type Schedule } from '../src/index.js';
import { buildCatalog, buildValidSchedule } from './fixtures.js';

describe('formatScheduleCsv', () => {
  it('writes one row per session sorted by date', () => {
    const csv = formatScheduleCsv(buildValidSchedule().reverse());

    expect(csv.split('\n')).toEqual([
      'Date,Course,Topic,Hours,Type,Notes',
      '2025-03-01,CS101,T1,3,learning,Initial learning session',
      '2025-03-02,CS101,T2,4,learning,Initial learning session',
      '2025-03-04,CS101,T1,1,review_1,First review (spaced repetition)',
      '2025-03-06,CS101,T2,1,review_1,First review (spaced repetition)',
      '2025-03-08,CS101,T2,1,review_2,Final review before exam',
      '',
    ]);
  });

  it('prefixes remaining issues as comment lines above the header', () => {
    const schedule = buildValidSchedule().slice(0, 2);
    const issues = validateSchedule(buildCatalog(), schedule);

    const lines = formatScheduleCsv(schedule, issues).split('\n');

    expect(lines.slice(0, 5)).toEqual([
      '# VALIDATION ISSUES:',
      '# - WARNING: Last study session for CS101 is 8 days before exam (2025-03-10)',
      '# - WARNING: Topic "T1" (CS101) has no review sessions (no spaced repetition)',
      '# - WARNING: Topic "T2" (CS101) has no review sessions (no spaced repetition)',
      '#',
    ]);
    expect(lines[5]).toBe('Date,Course,Topic,Hours,Type,Notes');
  });

  it('quotes fields that contain commas or quotes', () => {
    const schedule: Schedule = [
      {
        date: '2025-03-01',
        sessions: [{ course: 'PHYS 234', topic: 'Spin, "kets" and bras', hours: 2.5, type: 'learning' }],
      },
    ];

    expect(formatScheduleCsv(schedule).split('\n')[1]).toBe(
      '2025-03-01,PHYS 234,"Spin, ""kets"" and bras",2.5,learning,Initial learning session',
    );
  });
});
