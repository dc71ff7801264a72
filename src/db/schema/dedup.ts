import { pgTable, bigserial, text, timestamp, index } from 'drizzle-orm/pg-core';
import { fingerprintOutcomeEnum } from './enums.js';

// Both tables are append-only: rows are inserted, never updated.

export const fileFingerprints = pgTable('file_fingerprints', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  contentHash: text('content_hash').notNull(),
  jobId: text('job_id').notNull(),
  terminalState: fingerprintOutcomeEnum('terminal_state').notNull(),
  recordedAt: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_file_fingerprints_hash').on(table.contentHash, table.terminalState),
]);

export const committedKeys = pgTable('committed_keys', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  uniqueKey: text('unique_key').notNull(),
  jobId: text('job_id').notNull(),
  committedAt: timestamp('committed_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_committed_keys_key').on(table.uniqueKey, table.committedAt),
]);
