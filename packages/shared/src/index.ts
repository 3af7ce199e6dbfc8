export * from './schemas/catalog.js';
export * from './schemas/schedule.js';
export * from './schemas/priorities.js';
export * from './schemas/jsonSchemas.js';
export * from './validation/schedule.js';
export * from './report/csv.js';
export * from './json/repair.js';
export * from './ingest/overview.js';
export * from './ingest/toc.js';
export * from './dates.js';
export * from './config/featureFlags.js';
export * from './config/gemini.js';
export * from './gemini/index.js';
