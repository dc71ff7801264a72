import type postgres from 'postgres';
import type { Sql } from '../../db/index.js';
import {
  createSchemaStatement,
  createStagingStatement,
  dropStagingStatement,
  insertStagingStatement,
  setStatementTimeoutStatement,
  upsertStatement,
  type LoadPlan,
} from './statements.js';

export type StagedValue = string | null;
/** Values aligned with `LoadPlan.columns`. */
export type StagedRow = readonly StagedValue[];

export interface LoaderSession {
  createStaging(plan: LoadPlan): Promise<void>;
  insertStaging(plan: LoadPlan, rows: readonly StagedRow[]): Promise<void>;
  /** Returns the number of target rows inserted or updated. */
  upsert(plan: LoadPlan): Promise<number>;
  dropStaging(plan: LoadPlan): Promise<void>;
}

/**
 * Transactional access to the target database. Everything done through the
 * session commits together or not at all.
 */
export interface LoaderStore {
  transaction(work: (session: LoaderSession) => Promise<number>): Promise<number>;
  ensureStagingSchema(schema: string): Promise<void>;
  ping(): Promise<void>;
}

class PgLoaderSession implements LoaderSession {
  constructor(private readonly tx: postgres.TransactionSql) {}

  async createStaging(plan: LoadPlan): Promise<void> {
    await this.tx.unsafe(createStagingStatement(plan));
  }

  async insertStaging(plan: LoadPlan, rows: readonly StagedRow[]): Promise<void> {
    if (rows.length === 0) return;
    const params: StagedValue[] = rows.flat();
    await this.tx.unsafe(insertStagingStatement(plan, rows.length), params);
  }

  async upsert(plan: LoadPlan): Promise<number> {
    const result = await this.tx.unsafe(upsertStatement(plan));
    return result.count;
  }

  async dropStaging(plan: LoadPlan): Promise<void> {
    await this.tx.unsafe(dropStagingStatement(plan));
  }
}

export class PgLoaderStore implements LoaderStore {
  constructor(
    private readonly sql: Sql,
    private readonly statementTimeoutMs: number,
  ) {}

  async transaction(work: (session: LoaderSession) => Promise<number>): Promise<number> {
    return this.sql.begin(async (tx) => {
      await tx.unsafe(setStatementTimeoutStatement(this.statementTimeoutMs));
      return work(new PgLoaderSession(tx));
    });
  }

  async ensureStagingSchema(schema: string): Promise<void> {
    await this.sql.unsafe(createSchemaStatement(schema));
  }

  async ping(): Promise<void> {
    await this.sql`select 1`;
  }
}
