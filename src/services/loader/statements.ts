import type { ColumnConfig } from '../../config/index.js';

/** Every statement the loader issues is built here from validated identifiers. */

export const SOURCE_JOB_COLUMN = 'source_job_id';
export const PROCESSED_AT_COLUMN = 'processed_at';

// Postgres caps a statement at 65535 bind parameters.
const MAX_PARAMS = 65_000;
const MAX_ROWS_PER_INSERT = 1_000;

export interface LoadPlan {
  stagingTable: string;
  targetTable: string;
  uniqueKey: string;
  /** Unique key first, then the other configured columns, then the job back-reference. */
  columns: readonly string[];
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** `schema.table` or `table`, each part quoted. */
export function quoteQualified(name: string): string {
  return name.split('.').map(quoteIdent).join('.');
}

function columnList(columns: readonly string[]): string {
  return columns.map(quoteIdent).join(', ');
}

export function createSchemaStatement(schema: string): string {
  return `CREATE SCHEMA IF NOT EXISTS ${quoteIdent(schema)}`;
}

/** Copies the target's column types without its constraints or rows. */
export function createStagingStatement(plan: LoadPlan): string {
  return (
    `CREATE TABLE ${quoteQualified(plan.stagingTable)} AS ` +
    `SELECT ${columnList(plan.columns)} FROM ${quoteQualified(plan.targetTable)} WITH NO DATA`
  );
}

export function insertStagingStatement(plan: LoadPlan, rowCount: number): string {
  const width = plan.columns.length;
  const tuples: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const params = plan.columns.map((_, col) => `$${row * width + col + 1}`);
    tuples.push(`(${params.join(', ')})`);
  }
  return (
    `INSERT INTO ${quoteQualified(plan.stagingTable)} (${columnList(plan.columns)}) ` +
    `VALUES ${tuples.join(', ')}`
  );
}

export function rowsPerInsert(columnCount: number): number {
  return Math.max(1, Math.min(MAX_ROWS_PER_INSERT, Math.floor(MAX_PARAMS / Math.max(columnCount, 1))));
}

/**
 * One set-based upsert from staging into the target. A colliding key gets
 * every non-key column overwritten and a fresh processed timestamp, so the
 * result depends only on the existing and incoming rows.
 */
export function upsertStatement(plan: LoadPlan): string {
  const insertColumns = [...plan.columns, PROCESSED_AT_COLUMN];
  const updates = insertColumns
    .filter((column) => column !== plan.uniqueKey)
    .map((column) => `${quoteIdent(column)} = EXCLUDED.${quoteIdent(column)}`);

  return (
    `INSERT INTO ${quoteQualified(plan.targetTable)} (${columnList(insertColumns)}) ` +
    `SELECT ${columnList(plan.columns)}, now() FROM ${quoteQualified(plan.stagingTable)} ` +
    `ON CONFLICT (${quoteIdent(plan.uniqueKey)}) DO UPDATE SET ${updates.join(', ')}`
  );
}

export function dropStagingStatement(plan: LoadPlan): string {
  return `DROP TABLE IF EXISTS ${quoteQualified(plan.stagingTable)}`;
}

export function setStatementTimeoutStatement(timeoutMs: number): string {
  return `SET LOCAL statement_timeout = ${Math.max(1, Math.floor(timeoutMs))}`;
}

/** Target table for a fresh database: every configured column as text. */
export function createTargetStatement(targetTable: string, columns: ColumnConfig): string {
  const [uniqueKey, ...rest] = columns.all;
  if (!uniqueKey) throw new Error('Column configuration has no unique key');

  const definitions = [
    `${quoteIdent(uniqueKey)} text PRIMARY KEY`,
    ...rest.map((column) => `${quoteIdent(column)} text`),
    `${quoteIdent(SOURCE_JOB_COLUMN)} text`,
    `${quoteIdent(PROCESSED_AT_COLUMN)} timestamp with time zone DEFAULT now() NOT NULL`,
  ];
  return `CREATE TABLE IF NOT EXISTS ${quoteQualified(targetTable)} (\n  ${definitions.join(',\n  ')}\n)`;
}
