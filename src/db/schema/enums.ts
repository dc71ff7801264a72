import { pgEnum } from 'drizzle-orm/pg-core';

export const ingestJobStateEnum = pgEnum('ingest_job_state', [
  'pending', 'processing', 'succeeded', 'retrying', 'failed',
]);

export const failureKindEnum = pgEnum('failure_kind', [
  'validation', 'transient', 'permanent',
]);

export const fingerprintOutcomeEnum = pgEnum('fingerprint_outcome', [
  'succeeded', 'failed',
]);
