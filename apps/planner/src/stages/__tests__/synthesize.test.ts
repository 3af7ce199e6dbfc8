import { describe, expect, it } from 'vitest';

import { MalformedOracleOutputError, MissingPreconditionError } from '../../errors.js';
import {
  TODAY,
  buildCatalog,
  buildDeps,
  buildLargeCatalog,
  buildValidSchedule,
  scriptedOracle,
} from '../../__tests__/helpers.js';
import {
  BREVITY_INSTRUCTION,
  buildGeneratePrompt,
  buildScheduleRequest,
  generateSchedule,
  repairSchedule,
  reviewTierFor,
} from '../synthesize.js';

const PRIORITIES = { CS101: { priority_score: 9, reasoning: 'Exam in 11 days.' } };

describe('reviewTierFor', () => {
  it('relaxes review requirements as the topic count grows', () => {
    expect(reviewTierFor(10)).toBe('full');
    expect(reviewTierFor(11)).toBe('reduced');
    expect(reviewTierFor(15)).toBe('reduced');
    expect(reviewTierFor(16)).toBe('minimal');
  });
});

describe('buildScheduleRequest', () => {
  it('derives the closed date set from tomorrow to the last exam, skipping rest days', () => {
    const catalog = buildCatalog();
    catalog.preferences.rest_days = ['Sunday'];

    const request = buildScheduleRequest(catalog, PRIORITIES, TODAY);

    expect(request.validDates).toEqual([
      '2025-02-28',
      '2025-03-01',
      '2025-03-03',
      '2025-03-04',
      '2025-03-05',
      '2025-03-06',
      '2025-03-07',
      '2025-03-08',
    ]);
    expect(request.courses).toEqual([
      {
        code: 'CS101',
        midterm_date: '2025-03-10',
        last_valid_study_date: '2025-03-09',
        midterm_weight: 30,
        total_pages: 80,
        priority_score: 9,
        topics: [
          { name: 'T1', pages: 30 },
          { name: 'T2', pages: 50 },
        ],
      },
    ]);
    expect(request.tier).toBe('full');
    expect(request.sessionTypes).toEqual(['learning', 'review_1', 'review_2']);
  });

  it('orders courses by priority score', () => {
    const request = buildScheduleRequest(
      buildLargeCatalog(3, 3),
      {
        BIO200: { priority_score: 4, reasoning: 'Exam in 21 days.' },
        CHEM150: { priority_score: 7, reasoning: 'Exam in 25 days.' },
      },
      TODAY,
    );

    expect(request.courses.map((course) => course.code)).toEqual(['CHEM150', 'BIO200']);
  });
});

describe('buildGeneratePrompt', () => {
  it('drops review_2 and limits review_1 to the top course for more than 15 topics', async () => {
    const catalog = buildLargeCatalog(9, 8);
    const priorities = {
      BIO200: { priority_score: 9, reasoning: 'Exam in 21 days.' },
      CHEM150: { priority_score: 4, reasoning: 'Exam in 25 days.' },
    };
    const oracle = scriptedOracle('[]');

    await generateSchedule(catalog, priorities, buildDeps(oracle));

    const request = oracle.generate.mock.calls[0][0];
    expect(request.prompt).toContain(
      'Only topics of BIO200 (the highest-priority course) need a "review_1" session',
    );
    expect(request.prompt).toContain('Do not create any "review_2" sessions.');
    expect(request.prompt).toContain('"type" values MUST be one of: ["learning","review_1"].');
    expect(request.responseSchema).toMatchObject({
      items: {
        properties: {
          sessions: { items: { properties: { type: { enum: ['learning', 'review_1'] } } } },
        },
      },
    });
  });

  it('uses the reduced review rules for 11 to 15 topics', () => {
    const request = buildScheduleRequest(buildLargeCatalog(6, 6), {}, TODAY);

    const prompt = buildGeneratePrompt(request);

    expect(prompt).toContain('Topics with 20 or more pages need a "review_1" session');
    expect(prompt).toContain('Only the single topic with the most pages in each course gets a "review_2" session');
  });

  it('states a hard daily cap only when the user set one', () => {
    const capped = buildGeneratePrompt(buildScheduleRequest(buildCatalog(), PRIORITIES, TODAY));
    const open = buildGeneratePrompt(buildScheduleRequest(buildLargeCatalog(2, 2), {}, TODAY));

    expect(capped).toContain('Total hours per day MUST NOT exceed 6.');
    expect(open).toContain('Aim for 4-6 total hours per day and never exceed 8.');
  });
});

describe('generateSchedule', () => {
  it('keeps only sessions inside the closed sets', async () => {
    const oracle = scriptedOracle(
      JSON.stringify([
        {
          date: '2025-03-01',
          sessions: [
            { course: 'CS101', topic: 'T1', hours: 2.96, type: 'learning' },
            { course: 'CS101', topic: 'Final Review', hours: 1, type: 'review_1' },
            { course: 'MATH9', topic: 'T1', hours: 1, type: 'learning' },
            { course: 'CS101', topic: 'T2', hours: 1, type: 'cram' },
          ],
        },
        { date: '2025-03-12', sessions: [{ course: 'CS101', topic: 'T2', hours: 2, type: 'learning' }] },
        { date: '2025-03-01', sessions: [{ course: 'CS101', topic: 'T2', hours: 2, type: 'learning' }] },
      ]),
    );
    const deps = buildDeps(oracle);

    const schedule = await generateSchedule(buildCatalog(), PRIORITIES, deps);

    expect(schedule).toEqual([
      {
        date: '2025-03-01',
        sessions: [
          { course: 'CS101', topic: 'T1', hours: 3, type: 'learning' },
          { course: 'CS101', topic: 'T2', hours: 2, type: 'learning' },
        ],
      },
    ]);
    expect(deps.logger.warn).toHaveBeenCalledWith(
      'generate:dropped-sessions',
      expect.objectContaining({ count: 4 }),
    );
  });

  it('drops review types the tier does not allow', async () => {
    const catalog = buildLargeCatalog(9, 8);
    const oracle = scriptedOracle(
      JSON.stringify([
        {
          date: '2025-03-03',
          sessions: [
            { course: 'BIO200', topic: 'Cell 1', hours: 2, type: 'learning' },
            { course: 'BIO200', topic: 'Cell 2', hours: 1, type: 'review_2' },
          ],
        },
      ]),
    );
    const deps = buildDeps(oracle);

    const schedule = await generateSchedule(catalog, {}, deps);

    expect(schedule).toEqual([
      {
        date: '2025-03-03',
        sessions: [{ course: 'BIO200', topic: 'Cell 1', hours: 2, type: 'learning' }],
      },
    ]);
    expect(deps.logger.warn).toHaveBeenCalledWith('generate:dropped-sessions', {
      count: 1,
      reasons: ['2025-03-03: review_2 is not scheduled in the minimal tier'],
    });
  });

  it('recovers the complete days of a truncated answer', async () => {
    const oracle = scriptedOracle(
      '[{"date":"2025-03-01","sessions":[{"course":"CS101","topic":"T1","hours":3,"type":"learning"}]},{"date":"2025-03-02","sessions":[{"course":"CS1',
    );

    const schedule = await generateSchedule(buildCatalog(), PRIORITIES, buildDeps(oracle));

    expect(schedule).toEqual([
      { date: '2025-03-01', sessions: [{ course: 'CS101', topic: 'T1', hours: 3, type: 'learning' }] },
    ]);
    expect(oracle.generate).toHaveBeenCalledTimes(1);
  });

  it('asks once for a shorter answer when the output cannot be repaired', async () => {
    const oracle = scriptedOracle('Here is your plan:', JSON.stringify(buildValidSchedule()));

    const schedule = await generateSchedule(buildCatalog(), PRIORITIES, buildDeps(oracle));

    expect(schedule).toEqual(buildValidSchedule());
    expect(oracle.generate).toHaveBeenCalledTimes(2);
    expect(oracle.generate.mock.calls[1][0].prompt.endsWith(BREVITY_INSTRUCTION)).toBe(true);
  });

  it('fails with a typed error when the shorter answer is still unusable', async () => {
    const oracle = scriptedOracle('Here is your plan:', '{"status": "too many topics"}');

    await expect(
      generateSchedule(buildCatalog(), PRIORITIES, buildDeps(oracle)),
    ).rejects.toBeInstanceOf(MalformedOracleOutputError);
    expect(oracle.generate).toHaveBeenCalledTimes(2);
  });

  it('returns an empty schedule without the oracle when no date is left before the exam', async () => {
    const catalog = buildCatalog();
    catalog.courses.CS101 = { ...catalog.courses.CS101, midterm_date: '2025-02-28' };
    const oracle = scriptedOracle();

    await expect(generateSchedule(catalog, PRIORITIES, buildDeps(oracle))).resolves.toEqual([]);
    expect(oracle.generate).not.toHaveBeenCalled();
  });

  it('requires priorities', async () => {
    await expect(
      generateSchedule(buildCatalog(), null, buildDeps(scriptedOracle())),
    ).rejects.toBeInstanceOf(MissingPreconditionError);
  });
});

describe('repairSchedule', () => {
  it('sends the errors and the previous candidate back to the oracle', async () => {
    const previous = buildValidSchedule().slice(0, 1);
    const oracle = scriptedOracle(JSON.stringify(buildValidSchedule()));

    const schedule = await repairSchedule(
      buildCatalog(),
      PRIORITIES,
      previous,
      ['ERROR: Course CS101 missing topics: T2'],
      buildDeps(oracle),
    );

    const request = oracle.generate.mock.calls[0][0];
    expect(request.stage).toBe('repair');
    expect(request.prompt).toContain('1. ERROR: Course CS101 missing topics: T2');
    expect(request.prompt).toContain(JSON.stringify(previous));
    expect(schedule).toEqual(buildValidSchedule());
  });

  it('requires a previous candidate', async () => {
    await expect(
      repairSchedule(buildCatalog(), PRIORITIES, null, [], buildDeps(scriptedOracle())),
    ).rejects.toThrow('repair requires candidate schedule, which has not been produced yet');
  });
});
