import {
  GeminiApiError,
  GeminiResponseSchemaError,
  formatIssue,
  partitionIssues,
  summarizeSchedule,
  validateSchedule,
} from '@studyplan/shared';
import type { CourseCatalog, PriorityTable, Schedule, ScheduleIssue } from '@studyplan/shared';

import {
  MalformedOracleOutputError,
  MissingPreconditionError,
  OracleUnavailableError,
} from './errors.js';
import type { StageDependencies } from './stages/common.js';
import { rankCourses } from './stages/rank.js';
import { generateSchedule, repairSchedule } from './stages/synthesize.js';

/** One initial generation plus up to two repairs. */
export const MAX_GENERATION_ATTEMPTS = 3;

export type PlannerState = 'RANK' | 'GENERATE' | 'VALIDATE' | 'REPAIR' | 'DONE';

export interface PlannerContext {
  state: PlannerState;
  catalog: CourseCatalog;
  priorities: PriorityTable | null;
  candidate: Schedule | null;
  issues: ScheduleIssue[];
  attempts: number;
}

export type PlannerStatus = 'valid' | 'best_effort';

export interface PlannerResult {
  schedule: Schedule;
  issues: ScheduleIssue[];
  errors: ScheduleIssue[];
  warnings: ScheduleIssue[];
  attempts: number;
  priorities: PriorityTable;
  status: PlannerStatus;
}

export function createPlannerContext(catalog: CourseCatalog): PlannerContext {
  return {
    state: 'RANK',
    catalog,
    priorities: null,
    candidate: null,
    issues: [],
    attempts: 0,
  };
}

/** Errors that end one oracle round trip; pipeline-ordering errors are not among them. */
function isFailedOracleCall(
  error: unknown,
): error is
  | MalformedOracleOutputError
  | OracleUnavailableError
  | GeminiApiError
  | GeminiResponseSchemaError {
  return (
    error instanceof MalformedOracleOutputError ||
    error instanceof OracleUnavailableError ||
    error instanceof GeminiApiError ||
    error instanceof GeminiResponseSchemaError
  );
}

/** Runs the current state and returns the context for the next one. */
export async function advance(
  context: PlannerContext,
  deps: StageDependencies,
): Promise<PlannerContext> {
  switch (context.state) {
    case 'RANK': {
      const priorities = await rankCourses(context.catalog, deps);
      return { ...context, priorities, state: 'GENERATE' };
    }
    case 'GENERATE': {
      const candidate = await generateSchedule(context.catalog, context.priorities, deps);
      return { ...context, candidate, attempts: context.attempts + 1, state: 'VALIDATE' };
    }
    case 'VALIDATE': {
      if (!context.candidate) {
        throw new MissingPreconditionError('validate', 'candidate schedule');
      }
      const issues = validateSchedule(context.catalog, context.candidate);
      const { errors, warnings } = partitionIssues(issues);
      const finished = errors.length === 0 || context.attempts >= MAX_GENERATION_ATTEMPTS;
      deps.logger.info('loop:validated', {
        attempt: context.attempts,
        errors: errors.length,
        warnings: warnings.length,
        next: finished ? 'DONE' : 'REPAIR',
      });
      return { ...context, issues, state: finished ? 'DONE' : 'REPAIR' };
    }
    case 'REPAIR': {
      const attempts = context.attempts + 1;
      const violations = partitionIssues(context.issues).errors.map(formatIssue);
      try {
        const candidate = await repairSchedule(
          context.catalog,
          context.priorities,
          context.candidate,
          violations,
          deps,
        );
        return { ...context, candidate, attempts, state: 'VALIDATE' };
      } catch (error) {
        if (isFailedOracleCall(error)) {
          // the previous candidate and its issues stay the result of record
          deps.logger.error('loop:repair-failed', { attempt: attempts, message: error.message });
          return {
            ...context,
            attempts,
            state: attempts >= MAX_GENERATION_ATTEMPTS ? 'DONE' : 'REPAIR',
          };
        }
        throw error;
      }
    }
    case 'DONE':
      return context;
  }
}

/**
 * Ranks once, then generates and validates until the candidate has no errors
 * or the attempt budget is spent. The last candidate is always returned.
 */
export async function runPlanner(
  catalog: CourseCatalog,
  deps: StageDependencies,
): Promise<PlannerResult> {
  let context = createPlannerContext(catalog);
  while (context.state !== 'DONE') {
    context = await advance(context, deps);
  }

  if (!context.candidate || !context.priorities) {
    throw new MissingPreconditionError('done', 'candidate schedule');
  }

  const { errors, warnings } = partitionIssues(context.issues);
  const status: PlannerStatus = errors.length === 0 ? 'valid' : 'best_effort';
  deps.logger.info('loop:done', {
    status,
    attempts: context.attempts,
    errors: errors.length,
    warnings: warnings.length,
    ...summarizeSchedule(context.candidate),
  });

  return {
    schedule: context.candidate,
    issues: context.issues,
    errors,
    warnings,
    attempts: context.attempts,
    priorities: context.priorities,
    status,
  };
}
