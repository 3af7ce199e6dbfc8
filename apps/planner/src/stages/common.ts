import { JsonRepairError, parseJsonWithRepair, toIsoDate } from '@studyplan/shared';
import type { ParsedJson } from '@studyplan/shared';

import type { Logger } from '../logger.js';
import type { Oracle } from '../oracle.js';

export interface StageDependencies {
  oracle: Oracle;
  logger: Logger;
  /** Clock used to derive "today"; defaults to the system clock. */
  now?: () => Date;
}

export function todayOf(deps: Pick<StageDependencies, 'now'>): string {
  return toIsoDate(deps.now ? deps.now() : new Date());
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parses an oracle answer, returning null when even the truncation repair fails. */
export function readOracleJson(raw: string): ParsedJson | null {
  try {
    return parseJsonWithRepair(raw);
  } catch (error) {
    if (error instanceof JsonRepairError) {
      return null;
    }
    throw error;
  }
}
