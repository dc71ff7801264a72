export * from './enums.js';
export * from './ingest-jobs.js';
export * from './dedup.js';
