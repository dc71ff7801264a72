import { and, asc, count, desc, eq, inArray } from 'drizzle-orm';
import type { Db } from '../../db/index.js';
import { schema } from '../../db/index.js';
import {
  assertTransition,
  emptyStateCounts,
  type Job,
  type JobLedger,
  type JobPatch,
  type JobState,
  type NewJob,
  type StateCounts,
} from './model.js';

type JobRow = typeof schema.ingestJobs.$inferSelect;

function toJob(row: JobRow): Job {
  return {
    id: row.id,
    sequence: row.sequence,
    sourceRef: row.sourceRef,
    payloadPath: row.payloadPath,
    contentHash: row.contentHash,
    state: row.state,
    attemptCount: row.attemptCount,
    lastError: row.lastError,
    lastErrorKind: row.lastErrorKind,
    nextAttemptAt: row.nextAttemptAt,
    committedCount: row.committedCount,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class PgJobLedger implements JobLedger {
  constructor(private readonly db: Db) {}

  async insert(job: NewJob): Promise<Job> {
    const [row] = await this.db
      .insert(schema.ingestJobs)
      .values({ id: job.id, sourceRef: job.sourceRef, payloadPath: job.payloadPath })
      .returning();
    if (!row) throw new Error(`Insert of job ${job.id} returned no row`);
    return toJob(row);
  }

  async get(id: string): Promise<Job | undefined> {
    const [row] = await this.db
      .select()
      .from(schema.ingestJobs)
      .where(eq(schema.ingestJobs.id, id))
      .limit(1);
    return row ? toJob(row) : undefined;
  }

  async compareAndSet(id: string, expected: JobState, patch: JobPatch): Promise<Job | undefined> {
    assertTransition(id, expected, patch);

    const [row] = await this.db
      .update(schema.ingestJobs)
      .set({ ...patch, updatedAt: new Date() })
      .where(and(eq(schema.ingestJobs.id, id), eq(schema.ingestJobs.state, expected)))
      .returning();
    return row ? toJob(row) : undefined;
  }

  async listByState(states: readonly JobState[]): Promise<Job[]> {
    if (states.length === 0) return [];
    const rows = await this.db
      .select()
      .from(schema.ingestJobs)
      .where(inArray(schema.ingestJobs.state, [...states]))
      .orderBy(asc(schema.ingestJobs.sequence));
    return rows.map(toJob);
  }

  async list(options: { state?: JobState; limit: number }): Promise<Job[]> {
    const rows = await this.db
      .select()
      .from(schema.ingestJobs)
      .where(options.state ? eq(schema.ingestJobs.state, options.state) : undefined)
      .orderBy(desc(schema.ingestJobs.sequence))
      .limit(options.limit);
    return rows.map(toJob);
  }

  async countByState(): Promise<StateCounts> {
    const rows = await this.db
      .select({ state: schema.ingestJobs.state, total: count() })
      .from(schema.ingestJobs)
      .groupBy(schema.ingestJobs.state);

    const counts = emptyStateCounts();
    for (const row of rows) counts[row.state] = row.total;
    return counts;
  }
}
