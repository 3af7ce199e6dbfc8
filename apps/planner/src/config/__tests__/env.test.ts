import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const modulePath = '../env.js';
const variables = [
  'ORACLE_MAX_ATTEMPTS',
  'ORACLE_RETRY_DELAY_MS',
  'PLANNER_OUTPUT_PATH',
  'PLANNER_RUN_ID',
  'PLANNER_LOG_LEVEL',
];

function clearEnv() {
  for (const name of variables) {
    delete process.env[name];
  }
}

describe('getPlannerConfig', () => {
  beforeEach(() => {
    vi.resetModules();
    clearEnv();
  });

  afterEach(() => {
    clearEnv();
  });

  it('returns defaults when nothing is set', async () => {
    const { getPlannerConfig } = await import(modulePath);

    expect(getPlannerConfig()).toEqual({
      oracleMaxAttempts: 5,
      oracleRetryDelayMs: 15_000,
      outputPath: 'study_plan.csv',
      runId: 'local',
      logLevel: 'info',
    });
  });

  it('reads overrides', async () => {
    process.env.ORACLE_MAX_ATTEMPTS = '2';
    process.env.ORACLE_RETRY_DELAY_MS = '250';
    process.env.PLANNER_OUTPUT_PATH = 'out/plan.csv';
    process.env.PLANNER_RUN_ID = 'spring';
    process.env.PLANNER_LOG_LEVEL = 'debug';
    const { getPlannerConfig } = await import(modulePath);

    expect(getPlannerConfig()).toEqual({
      oracleMaxAttempts: 2,
      oracleRetryDelayMs: 250,
      outputPath: 'out/plan.csv',
      runId: 'spring',
      logLevel: 'debug',
    });
  });

  it('rejects a non-integer attempt count', async () => {
    process.env.ORACLE_MAX_ATTEMPTS = '2.5';
    const { getPlannerConfig } = await import(modulePath);

    expect(() => getPlannerConfig()).toThrow('ORACLE_MAX_ATTEMPTS must be a positive integer.');
  });

  it('rejects an unknown log level', async () => {
    process.env.PLANNER_LOG_LEVEL = 'verbose';
    const { getPlannerConfig } = await import(modulePath);

    expect(() => getPlannerConfig()).toThrow(/^Planner environment validation failed: PLANNER_LOG_LEVEL: /);
  });
});
