import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config/index.js';
import { bootstrapStatements } from '../../src/db/bootstrap.js';
import { baseEnv } from '../helpers/harness.js';

describe('bootstrapStatements', () => {
  it('creates the ledger, dedup index, staging schema and target table', () => {
    const statements = bootstrapStatements(loadConfig(baseEnv));

    expect(statements).toHaveLength(11);
    expect(statements[3]).toContain('CREATE TABLE IF NOT EXISTS "ingest_jobs"');
    expect(statements[9]).toBe('CREATE SCHEMA IF NOT EXISTS "temp_processing"');
    expect(statements[10]).toBe(
      'CREATE TABLE IF NOT EXISTS "tracking_data" (\n' +
        '  "hawb" text PRIMARY KEY,\n' +
        '  "carrier" text,\n' +
        '  "status" text,\n' +
        '  "source_job_id" text,\n' +
        '  "processed_at" timestamp with time zone DEFAULT now() NOT NULL\n' +
        ')',
    );
  });

  it('creates the schema of a qualified target table', () => {
    const statements = bootstrapStatements(loadConfig({ ...baseEnv, DB_TARGET_TABLE: 'warehouse.tracking' }));

    expect(statements).toHaveLength(12);
    expect(statements[10]).toBe('CREATE SCHEMA IF NOT EXISTS "warehouse"');
    expect(statements[11]?.startsWith('CREATE TABLE IF NOT EXISTS "warehouse"."tracking" (')).toBe(true);
  });

  it('only runs idempotent statements', () => {
    for (const statement of bootstrapStatements(loadConfig(baseEnv))) {
      expect(statement).toMatch(/IF NOT EXISTS|EXCEPTION WHEN duplicate_object/);
    }
  });
});
