import {
  DEFAULT_PRIORITY_SCORE,
  buildPriorityJsonSchema,
  daysBetween,
  eligibleCourses,
  isResponseSchemaEnforced,
} from '@studyplan/shared';
import type { CourseCatalog, EligibleCourse, PriorityEntry, PriorityTable } from '@studyplan/shared';
import { z } from 'zod';

import { isRecord, readOracleJson, todayOf } from './common.js';
import type { StageDependencies } from './common.js';

const rankerSystemPrompt = [
  'You rank university courses by how urgently each one needs study time before its midterm exam.',
  'Apply the factors as a strict tie-break chain, never as a weighted sum:',
  '1. Exam proximity: a course with fewer days until its exam always ranks higher.',
  '2. Content volume: only when days until exam are equal, more total pages ranks higher.',
  '3. Grade weight: only when both are equal, a higher midterm weight ranks higher.',
  'Give every course a priority_score between 0 and 10 and a one-sentence reasoning that cites at least one number from the input.',
  'Return valid JSON only, no markdown or commentary.',
].join('\n');

const rankedEntrySchema = z.object({
  priority_score: z
    .number()
    .finite()
    .transform((score) => Math.min(10, Math.max(0, score))),
  reasoning: z.string().trim().min(1),
});

export function defaultReasoning(courseCode: string): string {
  return `No ranking returned for ${courseCode}; using default priority ${DEFAULT_PRIORITY_SCORE.toFixed(1)}.`;
}

export function buildRankingPrompt(courses: readonly EligibleCourse[], today: string): string {
  const rows = courses.map((course) => ({
    code: course.code,
    midterm_date: course.midterm_date,
    days_until_exam: daysBetween(today, course.midterm_date),
    total_pages: course.total_pages,
    midterm_weight: course.midterm_weight,
  }));
  return [
    `Today is ${today}.`,
    'Rank these courses:',
    JSON.stringify(rows, null, 2),
    'Respond with {"course_priorities": {"<course code>": {"priority_score": <0-10>, "reasoning": "<sentence>"}}}',
    `including exactly these course codes: ${courses.map((course) => course.code).join(', ')}.`,
  ].join('\n');
}

function rankingEntries(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    return {};
  }
  const wrapped = value.course_priorities;
  return isRecord(wrapped) ? wrapped : value;
}

/**
 * Scores every course that has a midterm date. Output the oracle leaves out or
 * garbles degrades to the default score instead of failing the run.
 */
export async function rankCourses(
  catalog: CourseCatalog,
  deps: StageDependencies,
): Promise<PriorityTable> {
  const courses = eligibleCourses(catalog);
  if (courses.length === 0) {
    deps.logger.warn('rank:no-eligible-courses');
    return {};
  }

  const codes = courses.map((course) => course.code);
  deps.logger.info('rank:start', { courses: codes });

  const raw = await deps.oracle.generate({
    stage: 'rank',
    prompt: buildRankingPrompt(courses, todayOf(deps)),
    systemInstruction: rankerSystemPrompt,
    ...(isResponseSchemaEnforced() ? { responseSchema: buildPriorityJsonSchema(codes) } : {}),
  });

  const parsed = readOracleJson(raw);
  if (!parsed) {
    deps.logger.warn('rank:unparseable', { length: raw.length });
  }
  const entries = rankingEntries(parsed?.value);

  const unknownCodes = Object.keys(entries).filter((code) => !codes.includes(code));
  if (unknownCodes.length > 0) {
    deps.logger.warn('rank:unknown-courses', { codes: unknownCodes });
  }

  const priorities: PriorityTable = {};
  const defaulted: string[] = [];
  for (const code of codes) {
    const entry = rankedEntrySchema.safeParse(entries[code]);
    if (entry.success) {
      priorities[code] = entry.data satisfies PriorityEntry;
    } else {
      defaulted.push(code);
      priorities[code] = { priority_score: DEFAULT_PRIORITY_SCORE, reasoning: defaultReasoning(code) };
    }
  }

  if (defaulted.length > 0) {
    deps.logger.warn('rank:defaulted', { codes: defaulted });
  }
  deps.logger.info('rank:completed', {
    scores: Object.fromEntries(codes.map((code) => [code, priorities[code].priority_score])),
  });

  return priorities;
}
