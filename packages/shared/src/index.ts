export * from './types/index.js';
export * from './constants/index.js';
export * from './schemas/ingestion.schema.js';
export * from './schemas/thresholds.schema.js';
export * from './utils/commit-hash.js';
export * from './utils/date.js';
export * from './utils/repo-urls.js';
export * from './utils/test-names.js';
export * from './utils/unique-job.js';
