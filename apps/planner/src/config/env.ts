import { z } from 'zod';

import { LOG_LEVELS } from '../logger.js';
import type { LogLevel } from '../logger.js';

const envSchema = z.object({
  ORACLE_MAX_ATTEMPTS: z.string().optional(),
  ORACLE_RETRY_DELAY_MS: z.string().optional(),
  PLANNER_OUTPUT_PATH: z.string().optional(),
  PLANNER_RUN_ID: z.string().optional(),
  PLANNER_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface PlannerConfig {
  oracleMaxAttempts: number;
  oracleRetryDelayMs: number;
  outputPath: string;
  runId: string;
  logLevel: LogLevel;
}

let cachedConfig: PlannerConfig | null = null;

function toPositiveInteger(value: string | undefined, fallback: number, label: string): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${label} must be a positive integer.`);
  }
  return parsed;
}

export function getPlannerConfig(): PlannerConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = envSchema.safeParse({ ...process.env });
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join(', ');
    throw new Error(`Planner environment validation failed: ${message}`);
  }

  cachedConfig = {
    oracleMaxAttempts: toPositiveInteger(parsed.data.ORACLE_MAX_ATTEMPTS, 5, 'ORACLE_MAX_ATTEMPTS'),
    oracleRetryDelayMs: toPositiveInteger(
      parsed.data.ORACLE_RETRY_DELAY_MS,
      15_000,
      'ORACLE_RETRY_DELAY_MS',
    ),
    outputPath: parsed.data.PLANNER_OUTPUT_PATH || 'study_plan.csv',
    runId: parsed.data.PLANNER_RUN_ID || 'local',
    logLevel: parsed.data.PLANNER_LOG_LEVEL ?? 'info',
  } satisfies PlannerConfig;

  return cachedConfig;
}
