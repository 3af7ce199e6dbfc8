import {
  DEFAULT_STUDY_TIMES,
  STUDY_STYLES,
  STUDY_TIMES,
  isResponseSchemaEnforced,
  userPreferencesJsonSchema,
} from '@studyplan/shared';
import type { UserPreferences } from '@studyplan/shared';
import { z } from 'zod';

import { readOracleJson } from './common.js';
import type { StageDependencies } from './common.js';

const preferencesSystemPrompt = [
  'You extract study preferences from a student message.',
  'max_hours_per_day: integer hours if the student states a limit, otherwise null.',
  'preferred_study_times: any of "morning", "afternoon", "evening".',
  'rest_days: full English weekday names the student will not study on.',
  'study_style: "intensive", "spaced_repetition" or "balanced".',
  'Return valid JSON only, no markdown or commentary.',
].join('\n');

// Each field falls back on its own so one bad value does not discard the rest.
const lenientPreferencesSchema = z.object({
  max_hours_per_day: z.number().int().positive().nullable().catch(null),
  preferred_study_times: z
    .array(z.enum(STUDY_TIMES))
    .min(1)
    .catch(() => [...DEFAULT_STUDY_TIMES]),
  rest_days: z
    .array(z.string().trim().min(1))
    .catch([]),
  study_style: z.enum(STUDY_STYLES).catch('spaced_repetition'),
});

export function defaultPreferences(): UserPreferences {
  return lenientPreferencesSchema.parse({});
}

export function coercePreferences(value: unknown): UserPreferences {
  const parsed = lenientPreferencesSchema.safeParse(value);
  return parsed.success ? parsed.data : defaultPreferences();
}

export async function parsePreferences(
  message: string,
  deps: StageDependencies,
): Promise<UserPreferences> {
  if (message.trim() === '') {
    return defaultPreferences();
  }

  deps.logger.info('preferences:start', { length: message.length });
  const raw = await deps.oracle.generate({
    stage: 'preferences',
    prompt: `Student message:\n${message}`,
    systemInstruction: preferencesSystemPrompt,
    ...(isResponseSchemaEnforced() ? { responseSchema: userPreferencesJsonSchema } : {}),
  });

  const parsed = readOracleJson(raw);
  if (!parsed) {
    deps.logger.warn('preferences:unparseable', { length: raw.length });
    return defaultPreferences();
  }
  const preferences = coercePreferences(parsed.value);
  deps.logger.info('preferences:parsed', { ...preferences });
  return preferences;
}
