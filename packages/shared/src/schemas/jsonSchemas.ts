import { STUDY_STYLES, STUDY_TIMES } from './catalog.js';
import type { SessionType } from './schedule.js';

export type JsonSchema = Record<string, unknown>;

function stringSchema(values?: readonly string[]): JsonSchema {
  if (!values || values.length === 0) {
    return { type: 'string' };
  }
  return { type: 'string', format: 'enum', enum: [...values] };
}

const priorityEntryJsonSchema: JsonSchema = {
  type: 'object',
  required: ['priority_score', 'reasoning'],
  properties: {
    priority_score: { type: 'number', minimum: 0, maximum: 10 },
    reasoning: {
      type: 'string',
      description: 'One sentence citing specific numbers from the input.',
    },
  },
};

export function buildPriorityJsonSchema(courseCodes: readonly string[]): JsonSchema {
  return {
    type: 'object',
    required: ['course_priorities'],
    properties: {
      course_priorities: {
        type: 'object',
        required: [...courseCodes],
        properties: Object.fromEntries(courseCodes.map((code) => [code, priorityEntryJsonSchema])),
      },
    },
  };
}

export interface ScheduleJsonSchemaInput {
  validDates: readonly string[];
  courseCodes: readonly string[];
  topicNames: readonly string[];
  sessionTypes: readonly SessionType[];
}

/** Response schema for a schedule; every enumerable field is limited to its closed set. */
export function buildScheduleJsonSchema(input: ScheduleJsonSchemaInput): JsonSchema {
  return {
    type: 'array',
    items: {
      type: 'object',
      required: ['date', 'sessions'],
      properties: {
        date: stringSchema(input.validDates),
        sessions: {
          type: 'array',
          items: {
            type: 'object',
            required: ['course', 'topic', 'hours', 'type'],
            properties: {
              course: stringSchema(input.courseCodes),
              topic: stringSchema(Array.from(new Set(input.topicNames))),
              hours: { type: 'number', minimum: 0.5, maximum: 8 },
              type: stringSchema(input.sessionTypes),
            },
            propertyOrdering: ['course', 'topic', 'hours', 'type'],
          },
        },
      },
      propertyOrdering: ['date', 'sessions'],
    },
  };
}

export const userPreferencesJsonSchema: JsonSchema = {
  type: 'object',
  required: ['preferred_study_times', 'rest_days', 'study_style'],
  properties: {
    max_hours_per_day: { type: 'integer', nullable: true },
    preferred_study_times: {
      type: 'array',
      items: stringSchema(STUDY_TIMES),
    },
    rest_days: {
      type: 'array',
      items: { type: 'string', description: 'Weekday name, e.g. "Sunday".' },
    },
    study_style: stringSchema(STUDY_STYLES),
  },
};
