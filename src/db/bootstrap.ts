import type { AppConfig } from '../config/index.js';
import { createSchemaStatement, createTargetStatement } from '../services/loader/statements.js';

/** Idempotent DDL for the job ledger, the dedup index, the staging schema and the target table. */
export function bootstrapStatements(config: Readonly<AppConfig>): string[] {
  const { stagingSchema, targetTable } = config.database;
  const targetSchema = targetTable.includes('.') ? targetTable.split('.')[0] : undefined;

  return [
    `DO $$ BEGIN CREATE TYPE "public"."ingest_job_state" AS ENUM('pending', 'processing', 'succeeded', 'retrying', 'failed'); EXCEPTION WHEN duplicate_object THEN NULL; END $$`,
    `DO $$ BEGIN CREATE TYPE "public"."failure_kind" AS ENUM('validation', 'transient', 'permanent'); EXCEPTION WHEN duplicate_object THEN NULL; END $$`,
    `DO $$ BEGIN CREATE TYPE "public"."fingerprint_outcome" AS ENUM('succeeded', 'failed'); EXCEPTION WHEN duplicate_object THEN NULL; END $$`,
    `CREATE TABLE IF NOT EXISTS "ingest_jobs" (
      "id" text PRIMARY KEY NOT NULL,
      "sequence" bigserial NOT NULL,
      "source_ref" text NOT NULL,
      "payload_path" text NOT NULL,
      "content_hash" text,
      "state" "ingest_job_state" DEFAULT 'pending' NOT NULL,
      "attempt_count" integer DEFAULT 0 NOT NULL,
      "last_error" text,
      "last_error_kind" "failure_kind",
      "next_attempt_at" timestamp with time zone,
      "committed_count" integer,
      "created_at" timestamp with time zone DEFAULT now() NOT NULL,
      "updated_at" timestamp with time zone DEFAULT now() NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS "file_fingerprints" (
      "id" bigserial PRIMARY KEY NOT NULL,
      "content_hash" text NOT NULL,
      "job_id" text NOT NULL,
      "terminal_state" "fingerprint_outcome" NOT NULL,
      "recorded_at" timestamp with time zone DEFAULT now() NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS "committed_keys" (
      "id" bigserial PRIMARY KEY NOT NULL,
      "unique_key" text NOT NULL,
      "job_id" text NOT NULL,
      "committed_at" timestamp with time zone DEFAULT now() NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS "idx_ingest_jobs_state_sequence" ON "ingest_jobs" USING btree ("state","sequence")`,
    `CREATE INDEX IF NOT EXISTS "idx_file_fingerprints_hash" ON "file_fingerprints" USING btree ("content_hash","terminal_state")`,
    `CREATE INDEX IF NOT EXISTS "idx_committed_keys_key" ON "committed_keys" USING btree ("unique_key","committed_at")`,
    createSchemaStatement(stagingSchema),
    ...(targetSchema && targetSchema !== stagingSchema ? [createSchemaStatement(targetSchema)] : []),
    createTargetStatement(targetTable, config.columns),
  ];
}
