import { customAlphabet } from 'nanoid';
import { logger } from '../../lib/logger.js';
import type { FieldValue, IngestRecord } from '../file-processor/index.js';
import { classifyStorageError } from './classify.js';
import { rowsPerInsert, SOURCE_JOB_COLUMN, type LoadPlan } from './statements.js';
import type { LoaderStore, StagedRow, StagedValue } from './store.js';

const stagingSuffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 12);

export interface LoaderOptions {
  stagingSchema: string;
  targetTable: string;
  uniqueKey: string;
  /** Configured columns, unique key first. */
  columns: readonly string[];
}

export function toStagedValue(value: FieldValue): StagedValue {
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Applies a batch of records to the target table in one transaction: stage,
 * set-based upsert keyed on the unique key, drop staging, commit.
 */
export class DatabaseLoader {
  constructor(
    private readonly store: LoaderStore,
    private readonly options: LoaderOptions,
  ) {}

  async prepare(): Promise<void> {
    await this.store.ensureStagingSchema(this.options.stagingSchema);
  }

  async ping(): Promise<void> {
    await this.store.ping();
  }

  /**
   * Returns the number of target rows written. Storage failures are thrown as
   * TransientStorageError or PermanentStorageError; a ValidationError raised
   * while the records are read propagates unchanged, before any transaction.
   * Once `signal` aborts, no further statement runs and the transaction rolls
   * back instead of committing.
   */
  async load(records: Iterable<IngestRecord>, context: { jobId: string; signal?: AbortSignal }): Promise<number> {
    const rows = this.collect(records, context.jobId);
    if (rows.length === 0) return 0;

    const plan: LoadPlan = {
      stagingTable: `${this.options.stagingSchema}.stage_${stagingSuffix()}`,
      targetTable: this.options.targetTable,
      uniqueKey: this.options.uniqueKey,
      columns: [...this.options.columns, SOURCE_JOB_COLUMN],
    };
    const chunkSize = rowsPerInsert(plan.columns.length);

    try {
      const checkpoint = (): void => context.signal?.throwIfAborted();
      const committed = await this.store.transaction(async (session) => {
        checkpoint();
        await session.createStaging(plan);
        for (let i = 0; i < rows.length; i += chunkSize) {
          checkpoint();
          await session.insertStaging(plan, rows.slice(i, i + chunkSize));
        }
        checkpoint();
        const written = await session.upsert(plan);
        checkpoint();
        await session.dropStaging(plan);
        checkpoint();
        return written;
      });

      logger.info(
        { jobId: context.jobId, staged: rows.length, committed, target: plan.targetTable },
        'Batch upserted',
      );
      return committed;
    } catch (error) {
      const classified = classifyStorageError(error);
      logger.warn(
        { jobId: context.jobId, err: error, sqlState: classified.sqlState, classification: classified.name },
        'Batch load rolled back',
      );
      throw classified;
    }
  }

  /** First occurrence of a key wins; the upsert cannot touch a row twice. */
  private collect(records: Iterable<IngestRecord>, jobId: string): StagedRow[] {
    const byKey = new Map<string, StagedRow>();
    for (const record of records) {
      if (byKey.has(record.uniqueKey)) continue;
      const values = this.options.columns.map((column) =>
        column === this.options.uniqueKey ? record.uniqueKey : toStagedValue(record.fields.get(column) ?? null),
      );
      byKey.set(record.uniqueKey, [...values, record.sourceJobId || jobId]);
    }
    return [...byKey.values()];
  }
}
