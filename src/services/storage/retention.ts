import { readdir, rm, rmdir, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { basename, join, resolve } from 'path';
import { errorCode } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import { ACTIVE_STATES, type JobLedger } from '../queue/model.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SweepResult {
  deleted: number;
  kept: number;
  protected: number;
}

/**
 * Deletes files under processed/ older than the retention period. A file
 * still referenced by a non-terminal job, at its recorded path or where
 * moveToProcessed puts it, is never touched.
 */
export class RetentionSweeper {
  constructor(
    private readonly processedDir: string,
    private readonly retentionDays: number,
    private readonly ledger: JobLedger,
  ) {}

  async sweep(now: Date = new Date()): Promise<SweepResult> {
    const cutoff = now.getTime() - this.retentionDays * DAY_MS;
    const activeJobs = await this.ledger.listByState(ACTIVE_STATES);
    // An active job's payload may already sit in processed/<job id>/ while its
    // ledger row still names the pending/ path.
    const referenced = new Set(
      activeJobs.flatMap((job) => [
        resolve(job.payloadPath),
        resolve(this.processedDir, job.id, basename(job.payloadPath)),
      ]),
    );

    const result: SweepResult = { deleted: 0, kept: 0, protected: 0 };
    await this.sweepDir(this.processedDir, cutoff, referenced, result);

    if (result.deleted > 0) {
      logger.info({ ...result, retentionDays: this.retentionDays }, 'Retention sweep removed old payloads');
    }
    return result;
  }

  private async sweepDir(dir: string, cutoff: number, referenced: Set<string>, result: SweepResult): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return;
      throw error;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.sweepDir(path, cutoff, referenced, result);
        if (dir !== this.processedDir) continue;
        const remaining = await readdir(path);
        if (remaining.length === 0) await rmdir(path);
        continue;
      }
      if (!entry.isFile()) continue;

      if (referenced.has(resolve(path))) {
        result.protected++;
        continue;
      }

      const info = await stat(path);
      if (info.mtime.getTime() < cutoff) {
        await rm(path, { force: true });
        result.deleted++;
      } else {
        result.kept++;
      }
    }
  }
}
