import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';

import { formatIssue, formatScheduleCsv } from '@studyplan/shared';

import { loadCatalogFile, saveCatalogFile } from './catalog.js';
import { getPlannerConfig } from './config/env.js';
import { createLogger } from './logger.js';
import { runPlanner } from './loop.js';
import { createGeminiOracle } from './oracle.js';
import { parsePreferences } from './stages/preferences.js';

const USAGE = 'Usage: study-planner --catalog <file> [--preferences "<text>"] [--output <file>]';

async function main() {
  const { values } = parseArgs({
    options: {
      catalog: { type: 'string', short: 'c' },
      preferences: { type: 'string', short: 'p' },
      output: { type: 'string', short: 'o' },
    },
  });

  if (!values.catalog) {
    throw new Error(USAGE);
  }

  const config = getPlannerConfig();
  const logger = createLogger({ runId: config.runId, level: config.logLevel });
  const oracle = createGeminiOracle({ config, logger });
  const outputPath = values.output ?? config.outputPath;

  let catalog = await loadCatalogFile(values.catalog);
  logger.info('planner:catalog-loaded', {
    path: values.catalog,
    courses: Object.keys(catalog.courses).length,
  });

  if (values.preferences) {
    const preferences = await parsePreferences(values.preferences, { oracle, logger });
    catalog = { ...catalog, preferences };
    await saveCatalogFile(values.catalog, catalog);
  }

  const result = await runPlanner(catalog, { oracle, logger });
  await writeFile(outputPath, formatScheduleCsv(result.schedule, result.issues), 'utf8');

  logger.info('planner:written', {
    output: outputPath,
    status: result.status,
    attempts: result.attempts,
  });
  if (result.status === 'best_effort') {
    for (const issue of result.errors) {
      logger.warn('planner:residual-error', { issue: formatIssue(issue) });
    }
  }
}

main().catch((error) => {
  console.error('[planner] fatal error', error);
  process.exitCode = 1;
});
