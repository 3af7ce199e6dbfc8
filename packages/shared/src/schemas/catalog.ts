import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const isoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, 'Expected a YYYY-MM-DD date')
  // shape errors are already reported by the regex
  .refine(
    (value) => !ISO_DATE_PATTERN.test(value) || isValid(parseISO(value)),
    'Expected a real calendar date',
  );

export const STUDY_TIMES = ['morning', 'afternoon', 'evening'] as const;
export const STUDY_STYLES = ['intensive', 'spaced_repetition', 'balanced'] as const;

export const DEFAULT_STUDY_TIMES: StudyTime[] = ['morning', 'afternoon'];

export type StudyTime = (typeof STUDY_TIMES)[number];
export type StudyStyle = (typeof STUDY_STYLES)[number];

export const topicSchema = z.object({
  name: z.string().min(1),
  chapters: z.array(z.string()).default([]),
  pages: z.number().int().nonnegative().default(0),
});

export const courseSchema = z
  .object({
    code: z.string().min(1),
    midterm_date: isoDateSchema.nullable().default(null),
    midterm_weight: z.number().int().min(0).max(100).default(0),
    topics: z.array(topicSchema).default([]),
    total_pages: z.number().int().nonnegative().default(0),
  })
  .superRefine((course, ctx) => {
    const seen = new Set<string>();
    course.topics.forEach((topic, index) => {
      if (seen.has(topic.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate topic name "${topic.name}"`,
          path: ['topics', index, 'name'],
        });
      }
      seen.add(topic.name);
    });
  });

export const userPreferencesSchema = z.object({
  max_hours_per_day: z.number().int().positive().nullable().default(null),
  preferred_study_times: z.array(z.enum(STUDY_TIMES)).default([...DEFAULT_STUDY_TIMES]),
  rest_days: z.array(z.string()).default([]),
  study_style: z.enum(STUDY_STYLES).default('spaced_repetition'),
});

export const courseCatalogSchema = z
  .object({
    courses: z.record(z.string(), courseSchema),
    preferences: userPreferencesSchema.default({}),
  })
  .superRefine((catalog, ctx) => {
    for (const [key, course] of Object.entries(catalog.courses)) {
      if (key !== course.code) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Course key "${key}" does not match course code "${course.code}"`,
          path: ['courses', key, 'code'],
        });
      }
    }
  });

export type Topic = z.infer<typeof topicSchema>;
export type Course = z.infer<typeof courseSchema>;
export type UserPreferences = z.infer<typeof userPreferencesSchema>;
export type CourseCatalog = z.infer<typeof courseCatalogSchema>;

/** A course that takes part in ranking, scheduling and validation. */
export type EligibleCourse = Course & { midterm_date: string };

export function isEligibleCourse(course: Course): course is EligibleCourse {
  return course.midterm_date !== null;
}

export function eligibleCourses(catalog: CourseCatalog): EligibleCourse[] {
  return Object.values(catalog.courses).filter(isEligibleCourse);
}

export class CatalogValidationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'CatalogValidationError';
  }
}

export function assertValidCatalog(payload: unknown): CourseCatalog {
  const result = courseCatalogSchema.safeParse(payload);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('\n');
    throw new CatalogValidationError(`Invalid course catalog:\n${formatted}`);
  }
  return result.data;
}

export function serializeCatalog(catalog: CourseCatalog): string {
  return JSON.stringify(catalog, null, 2);
}

export function parseCatalog(json: string): CourseCatalog {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogValidationError(`Course catalog is not valid JSON: ${reason}`);
  }
  return assertValidCatalog(payload);
}
