import {
  SESSION_TYPES,
  buildScheduleJsonSchema,
  eligibleCourses,
  isResponseSchemaEnforced,
  listStudyDates,
  normalizeSchedule,
  priorityScoreOf,
  sessionSchema,
  shiftIsoDate,
  summarizeSchedule,
} from '@studyplan/shared';
import type {
  CourseCatalog,
  PriorityTable,
  Schedule,
  ScheduleDay,
  Session,
  SessionType,
  UserPreferences,
} from '@studyplan/shared';

import { MalformedOracleOutputError, MissingPreconditionError } from '../errors.js';
import type { OracleRequest } from '../oracle.js';
import { isRecord, readOracleJson, todayOf } from './common.js';
import type { StageDependencies } from './common.js';

export type ReviewTier = 'full' | 'reduced' | 'minimal';

export const FULL_TIER_MAX_TOPICS = 10;
export const REDUCED_TIER_MAX_TOPICS = 15;
export const REVIEW_2_MIN_PAGES = 40;
export const REVIEW_1_MIN_PAGES_REDUCED = 20;
const BREVITY_RETRIES = 1;

export function reviewTierFor(topicCount: number): ReviewTier {
  if (topicCount > REDUCED_TIER_MAX_TOPICS) {
    return 'minimal';
  }
  if (topicCount > FULL_TIER_MAX_TOPICS) {
    return 'reduced';
  }
  return 'full';
}

export function sessionTypesFor(tier: ReviewTier): SessionType[] {
  return tier === 'minimal' ? ['learning', 'review_1'] : [...SESSION_TYPES];
}

export interface CourseRequest {
  code: string;
  midterm_date: string;
  last_valid_study_date: string;
  midterm_weight: number;
  total_pages: number;
  priority_score: number;
  topics: { name: string; pages: number }[];
}

/** Everything the oracle is allowed to choose from, derived before any call. */
export interface ScheduleRequest {
  today: string;
  validDates: string[];
  /** Eligible courses, highest priority first. */
  courses: CourseRequest[];
  topicCount: number;
  tier: ReviewTier;
  sessionTypes: SessionType[];
  preferences: UserPreferences;
}

export function buildScheduleRequest(
  catalog: CourseCatalog,
  priorities: PriorityTable,
  today: string,
): ScheduleRequest {
  const courses = eligibleCourses(catalog)
    .map(
      (course): CourseRequest => ({
        code: course.code,
        midterm_date: course.midterm_date,
        last_valid_study_date: shiftIsoDate(course.midterm_date, -1),
        midterm_weight: course.midterm_weight,
        total_pages: course.total_pages,
        priority_score: priorityScoreOf(priorities, course.code),
        topics: course.topics.map((topic) => ({ name: topic.name, pages: topic.pages })),
      }),
    )
    .sort(
      (a, b) =>
        b.priority_score - a.priority_score ||
        a.midterm_date.localeCompare(b.midterm_date) ||
        a.code.localeCompare(b.code),
    );

  const latestExam = courses.reduce<string | null>(
    (latest, course) => (latest === null || course.midterm_date > latest ? course.midterm_date : latest),
    null,
  );
  const validDates = latestExam
    ? listStudyDates(shiftIsoDate(today, 1), latestExam, catalog.preferences.rest_days)
    : [];

  const topicCount = courses.reduce((total, course) => total + course.topics.length, 0);
  const tier = reviewTierFor(topicCount);

  return {
    today,
    validDates,
    courses,
    topicCount,
    tier,
    sessionTypes: sessionTypesFor(tier),
    preferences: catalog.preferences,
  };
}

function reviewRules(request: ScheduleRequest): string[] {
  if (request.tier === 'minimal') {
    const top = request.courses[0]?.code ?? '';
    return [
      `Only topics of ${top} (the highest-priority course) need a "review_1" session, 3-5 days after learning. Topics of other courses get no review sessions.`,
      'Do not create any "review_2" sessions.',
    ];
  }
  if (request.tier === 'reduced') {
    return [
      `Topics with ${REVIEW_1_MIN_PAGES_REDUCED} or more pages need a "review_1" session, 3-5 days after learning; smaller topics may skip it.`,
      'Only the single topic with the most pages in each course gets a "review_2" session, scheduled close to the exam.',
    ];
  }
  return [
    'Every topic needs at least one "review_1" session, 3-5 days after its "learning" session.',
    `Topics with ${REVIEW_2_MIN_PAGES} or more pages also need a "review_2" session, scheduled close to the exam.`,
  ];
}

function dailyLoadRule(preferences: UserPreferences): string {
  if (preferences.max_hours_per_day !== null) {
    return `Total hours per day MUST NOT exceed ${preferences.max_hours_per_day}.`;
  }
  return 'Aim for 4-6 total hours per day and never exceed 8.';
}

export function buildGeneratePrompt(request: ScheduleRequest): string {
  const validTopics = Object.fromEntries(
    request.courses.map((course) => [course.code, course.topics.map((topic) => topic.name)]),
  );
  const rules = [
    '"date" values MUST come from VALID DATES. No other dates.',
    `"course" values MUST be one of: ${JSON.stringify(request.courses.map((course) => course.code))}.`,
    '"topic" values MUST exactly match one of the VALID TOPIC NAMES for that course. Never invent topics such as "Final Review".',
    `"type" values MUST be one of: ${JSON.stringify(request.sessionTypes)}.`,
    '"hours" must be greater than 0 with at most one decimal place.',
    dailyLoadRule(request.preferences),
    'Every topic of every course MUST appear exactly once with type "learning".',
    ...reviewRules(request),
    'All sessions for a course MUST be dated strictly before its midterm_date (on or before last_valid_study_date).',
    'The last session of each course should fall on or near its last_valid_study_date (1-2 days before the exam).',
    'Learning sessions take 2-4 hours scaled by topic pages. Review sessions take 0.5-1.5 hours.',
    'Spread topics across days instead of clustering a course on one day.',
    'Higher-priority courses get proportionally more total hours.',
  ];

  return [
    `Today: ${request.today}`,
    `Scheduling window: ${request.validDates[0] ?? ''} to ${request.validDates[request.validDates.length - 1] ?? ''} (inclusive)`,
    '',
    'COURSES (highest priority first):',
    JSON.stringify(request.courses, null, 2),
    '',
    `USER PREFERENCES: ${JSON.stringify(request.preferences)}`,
    '',
    'VALID DATES (use only these):',
    JSON.stringify(request.validDates),
    '',
    'VALID TOPIC NAMES (use only these exact strings per course):',
    JSON.stringify(validTopics),
    '',
    'RULES:',
    ...rules.map((rule, index) => `${index + 1}. ${rule}`),
    '',
    'Return a JSON array of day objects, only days that have sessions:',
    '[{"date": "YYYY-MM-DD", "sessions": [{"course": "CODE", "topic": "Exact Topic Name", "hours": 2.5, "type": "learning"}]}]',
  ].join('\n');
}

export function buildRepairPrompt(
  request: ScheduleRequest,
  previous: Schedule,
  violations: readonly string[],
): string {
  return [
    buildGeneratePrompt(request),
    '',
    'The previous schedule failed validation with these errors:',
    ...violations.map((violation, index) => `${index + 1}. ${violation}`),
    '',
    'PREVIOUS SCHEDULE:',
    JSON.stringify(previous),
    '',
    'Fix every listed error while keeping the sessions that were already correct. Return the complete corrected schedule.',
  ].join('\n');
}

export const BREVITY_INSTRUCTION =
  'Your previous answer was cut off or was not valid JSON. Return a shorter schedule: merge small sessions and drop optional review sessions so the whole JSON array fits in one response.';

const schedulerSystemPrompt = [
  'You are a study schedule generator that turns course data into a day-by-day plan.',
  'Follow every rule exactly and use only the dates, courses, topics and session types you are given.',
  'Return valid JSON only, no markdown or commentary.',
].join('\n');

function scheduleDays(value: unknown): unknown[] | null {
  if (Array.isArray(value)) {
    return value;
  }
  if (isRecord(value) && Array.isArray(value.schedule)) {
    return value.schedule;
  }
  return null;
}

interface CoercedSchedule {
  schedule: Schedule;
  dropped: string[];
}

/** Keeps only sessions whose date, course, topic and type lie inside the request's closed sets. */
export function coerceSchedule(days: readonly unknown[], request: ScheduleRequest): CoercedSchedule {
  const validDates = new Set(request.validDates);
  const topicsByCourse = new Map(
    request.courses.map((course) => [course.code, new Set(course.topics.map((topic) => topic.name))]),
  );
  const sessionTypes = new Set<SessionType>(request.sessionTypes);
  const dropped: string[] = [];
  const kept: ScheduleDay[] = [];

  days.forEach((day, index) => {
    if (!isRecord(day) || typeof day.date !== 'string' || !Array.isArray(day.sessions)) {
      dropped.push(`day #${index + 1} is not a {date, sessions} object`);
      return;
    }
    if (!validDates.has(day.date)) {
      dropped.push(`${day.date}: not a valid study date`);
      return;
    }
    const sessions: Session[] = [];
    for (const candidate of day.sessions) {
      const parsed = sessionSchema.safeParse(candidate);
      if (!parsed.success) {
        dropped.push(`${day.date}: malformed session`);
        continue;
      }
      const session = parsed.data;
      const topics = topicsByCourse.get(session.course);
      if (!topics) {
        dropped.push(`${day.date}: unknown course ${session.course}`);
        continue;
      }
      if (!topics.has(session.topic)) {
        dropped.push(`${day.date}: unknown topic "${session.topic}" for ${session.course}`);
        continue;
      }
      if (!sessionTypes.has(session.type)) {
        dropped.push(`${day.date}: ${session.type} is not scheduled in the ${request.tier} tier`);
        continue;
      }
      const hours = Math.round(session.hours * 10) / 10;
      if (hours <= 0) {
        dropped.push(`${day.date}: session for "${session.topic}" rounds to 0 hours`);
        continue;
      }
      sessions.push({ ...session, hours });
    }
    if (sessions.length > 0) {
      kept.push({ date: day.date, sessions });
    }
  });

  return { schedule: normalizeSchedule(kept), dropped };
}

async function requestSchedule(
  request: ScheduleRequest,
  oracleRequest: OracleRequest,
  deps: StageDependencies,
): Promise<Schedule> {
  const stage = oracleRequest.stage;
  let raw = await deps.oracle.generate(oracleRequest);

  for (let retry = 0; ; retry += 1) {
    const parsed = readOracleJson(raw);
    const days = parsed ? scheduleDays(parsed.value) : null;
    if (parsed && days) {
      if (parsed.repaired) {
        deps.logger.warn(`${stage}:repaired-truncation`, { length: raw.length });
      }
      const { schedule, dropped } = coerceSchedule(days, request);
      if (dropped.length > 0) {
        deps.logger.warn(`${stage}:dropped-sessions`, { count: dropped.length, reasons: dropped });
      }
      deps.logger.info(`${stage}:parsed`, { ...summarizeSchedule(schedule) });
      return schedule;
    }

    if (retry >= BREVITY_RETRIES) {
      throw new MalformedOracleOutputError(
        stage,
        'oracle output is not a JSON array of schedule days',
        raw,
      );
    }
    deps.logger.warn(`${stage}:malformed-output`, { length: raw.length, retry: retry + 1 });
    raw = await deps.oracle.generate({
      ...oracleRequest,
      prompt: `${oracleRequest.prompt}\n\n${BREVITY_INSTRUCTION}`,
    });
  }
}

function oracleRequestFor(
  stage: 'generate' | 'repair',
  request: ScheduleRequest,
  prompt: string,
): OracleRequest {
  return {
    stage,
    prompt,
    systemInstruction: schedulerSystemPrompt,
    ...(isResponseSchemaEnforced()
      ? {
          responseSchema: buildScheduleJsonSchema({
            validDates: request.validDates,
            courseCodes: request.courses.map((course) => course.code),
            topicNames: request.courses.flatMap((course) => course.topics.map((topic) => topic.name)),
            sessionTypes: request.sessionTypes,
          }),
        }
      : {}),
  };
}

export async function generateSchedule(
  catalog: CourseCatalog,
  priorities: PriorityTable | null,
  deps: StageDependencies,
): Promise<Schedule> {
  if (!priorities) {
    throw new MissingPreconditionError('generate', 'priorities');
  }
  const request = buildScheduleRequest(catalog, priorities, todayOf(deps));
  if (request.courses.length === 0 || request.validDates.length === 0) {
    deps.logger.warn('generate:nothing-to-schedule', {
      courses: request.courses.length,
      validDates: request.validDates.length,
    });
    return [];
  }

  deps.logger.info('generate:start', {
    courses: request.courses.length,
    topics: request.topicCount,
    tier: request.tier,
    validDates: request.validDates.length,
  });
  return requestSchedule(
    request,
    oracleRequestFor('generate', request, buildGeneratePrompt(request)),
    deps,
  );
}

export async function repairSchedule(
  catalog: CourseCatalog,
  priorities: PriorityTable | null,
  previous: Schedule | null,
  violations: readonly string[],
  deps: StageDependencies,
): Promise<Schedule> {
  if (!priorities) {
    throw new MissingPreconditionError('repair', 'priorities');
  }
  if (!previous) {
    throw new MissingPreconditionError('repair', 'candidate schedule');
  }
  const request = buildScheduleRequest(catalog, priorities, todayOf(deps));
  if (request.courses.length === 0 || request.validDates.length === 0) {
    return [];
  }

  deps.logger.info('repair:start', { violations: violations.length, tier: request.tier });
  return requestSchedule(
    request,
    oracleRequestFor('repair', request, buildRepairPrompt(request, previous, violations)),
    deps,
  );
}
