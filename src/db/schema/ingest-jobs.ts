import { pgTable, bigserial, text, timestamp, integer, index } from 'drizzle-orm/pg-core';
import { ingestJobStateEnum, failureKindEnum } from './enums.js';

export const ingestJobs = pgTable('ingest_jobs', {
  id: text('id').primaryKey(),
  sequence: bigserial('sequence', { mode: 'number' }).notNull(),

  sourceRef: text('source_ref').notNull(),
  payloadPath: text('payload_path').notNull(),
  contentHash: text('content_hash'),

  state: ingestJobStateEnum('state').notNull().default('pending'),
  attemptCount: integer('attempt_count').notNull().default(0),
  lastError: text('last_error'),
  lastErrorKind: failureKindEnum('last_error_kind'),
  nextAttemptAt: timestamp('next_attempt_at', { withTimezone: true }),
  committedCount: integer('committed_count'),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_ingest_jobs_state_sequence').on(table.state, table.sequence),
]);
