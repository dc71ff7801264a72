import { and, desc, eq, inArray, max } from 'drizzle-orm';
import type { Db } from '../../db/index.js';
import { schema } from '../../db/index.js';

export type FingerprintOutcome = 'succeeded' | 'failed';

export interface FileFingerprint {
  contentHash: string;
  jobId: string;
  terminalState: FingerprintOutcome;
  recordedAt: Date;
}

/**
 * Durable record of committed file hashes and committed unique keys.
 * Append-only: entries are added, never edited in place.
 */
export interface DedupIndex {
  /** Most recent `succeeded` entry for the hash, if any. */
  findCommittedFile(contentHash: string): Promise<FileFingerprint | undefined>;
  recordFile(entry: { contentHash: string; jobId: string; terminalState: FingerprintOutcome }): Promise<void>;
  recordKeys(keys: readonly string[], jobId: string): Promise<void>;
  /** Last commit time per key, for keys that were committed before. */
  lastCommittedAt(keys: readonly string[]): Promise<Map<string, Date>>;
}

const KEY_CHUNK = 1000;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
}

export class PgDedupIndex implements DedupIndex {
  constructor(private readonly db: Db) {}

  async findCommittedFile(contentHash: string): Promise<FileFingerprint | undefined> {
    const [row] = await this.db
      .select()
      .from(schema.fileFingerprints)
      .where(
        and(
          eq(schema.fileFingerprints.contentHash, contentHash),
          eq(schema.fileFingerprints.terminalState, 'succeeded'),
        ),
      )
      .orderBy(desc(schema.fileFingerprints.id))
      .limit(1);

    if (!row) return undefined;
    return {
      contentHash: row.contentHash,
      jobId: row.jobId,
      terminalState: row.terminalState,
      recordedAt: row.recordedAt,
    };
  }

  async recordFile(entry: { contentHash: string; jobId: string; terminalState: FingerprintOutcome }): Promise<void> {
    await this.db.insert(schema.fileFingerprints).values(entry);
  }

  async recordKeys(keys: readonly string[], jobId: string): Promise<void> {
    for (const part of chunk(keys, KEY_CHUNK)) {
      await this.db.insert(schema.committedKeys).values(part.map((uniqueKey) => ({ uniqueKey, jobId })));
    }
  }

  async lastCommittedAt(keys: readonly string[]): Promise<Map<string, Date>> {
    const result = new Map<string, Date>();
    for (const part of chunk(keys, KEY_CHUNK)) {
      const rows = await this.db
        .select({
          uniqueKey: schema.committedKeys.uniqueKey,
          lastCommittedAt: max(schema.committedKeys.committedAt),
        })
        .from(schema.committedKeys)
        .where(inArray(schema.committedKeys.uniqueKey, part))
        .groupBy(schema.committedKeys.uniqueKey);

      for (const row of rows) {
        if (row.lastCommittedAt) result.set(row.uniqueKey, row.lastCommittedAt);
      }
    }
    return result;
  }
}
