import { resolve } from 'path';
import { nanoid } from 'nanoid';
import type { QueueConfig } from '../../config/index.js';
import { ConflictError, NotFoundError, PermanentStorageError, toJobFailure, type JobFailure } from '../../lib/errors.js';
import { logger, type Logger } from '../../lib/logger.js';
import { backoffDelayMs, withTimeout, type BackoffPolicy } from '../../lib/retry.js';
import type { DedupIndex } from '../dedup-index/index.js';
import type { FileProcessor } from '../file-processor/index.js';
import type { DatabaseLoader } from '../loader/index.js';
import type { PayloadStore } from '../storage/payload-store.js';
import type { RetentionSweeper } from '../storage/retention.js';
import { systemClock, type Clock } from './clock.js';
import { KeyLockTable } from './key-locks.js';
import { ACTIVE_STATES, type Job, type JobLedger, type JobPatch, type StateCounts } from './model.js';

export type { Clock } from './clock.js';
export * from './model.js';

// Files younger than this may still be waiting for their enqueue call.
export const ORPHAN_MIN_AGE_MS = 60_000;

export interface QueueDependencies {
  ledger: JobLedger;
  dedup: DedupIndex;
  files: FileProcessor;
  loader: DatabaseLoader;
  payloads: PayloadStore;
  config: QueueConfig;
  retention?: RetentionSweeper;
  clock?: Clock;
}

export type JobOutcome = 'succeeded' | 'duplicate' | 'retrying' | 'failed' | 'stranded';

export interface DrainSummary {
  succeeded: number;
  duplicates: number;
  retried: number;
  failed: number;
  /** Attempts whose outcome could not be recorded nor rescheduled; the next drain recovers them. */
  stranded: number;
  /** Jobs still pending, processing or retrying when the drain returned. */
  remaining: number;
}

export interface QueueStatus {
  running: boolean;
  inFlight: number;
  counts: StateCounts;
}

type AttemptResult =
  | { kind: 'loaded'; contentHash: string; committedCount: number; keys: string[] }
  | { kind: 'duplicate'; contentHash: string; duplicateOf: string }
  | { kind: 'failed'; failure: JobFailure; contentHash: string | null };

interface InFlight {
  job: Job;
  done: Promise<JobOutcome>;
}

function emptySummary(): DrainSummary {
  return { succeeded: 0, duplicates: 0, retried: 0, failed: 0, stranded: 0, remaining: 0 };
}

function isDue(job: Job, now: Date): boolean {
  return job.nextAttemptAt === null || job.nextAttemptAt.getTime() <= now.getTime();
}

/**
 * Owns every job's lifecycle: claims jobs from the ledger, runs the file
 * processor and loader, and records exactly one outcome per attempt.
 *
 * With a concurrency bound of 1 jobs finish strictly in enqueue order; above
 * that, jobs whose unique keys overlap are serialized through a key-lock table.
 */
export class QueueProcessor {
  private readonly clock: Clock;
  private readonly locks = new KeyLockTable();
  private readonly inFlight = new Map<string, InFlight>();
  private readonly halted = new AbortController();
  private idle: AbortController | undefined;
  private wakeRequested = false;
  private running = false;
  private forever: Promise<void> | undefined;

  constructor(private readonly deps: QueueDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  private get policy(): BackoffPolicy {
    return {
      baseSeconds: this.deps.config.retryBaseSeconds,
      maxDelaySeconds: this.deps.config.retryMaxDelaySeconds,
    };
  }

  async enqueue(sourceRef: string, payloadPath: string): Promise<string> {
    const job = await this.deps.ledger.insert({ id: nanoid(), sourceRef, payloadPath });
    logger.info({ jobId: job.id, sourceRef, payloadPath }, 'Job enqueued');
    this.wake();
    return job.id;
  }

  /** Returns jobs left in processing by a previous run to retrying, due now. */
  async recover(): Promise<number> {
    const stuck = await this.deps.ledger.listByState(['processing']);
    let recovered = 0;
    for (const job of stuck) {
      if (this.inFlight.has(job.id)) continue;
      if (await this.release(job, 'Attempt interrupted before its outcome was recorded')) recovered++;
    }
    if (recovered > 0) logger.warn({ recovered }, 'Recovered interrupted jobs');
    return recovered;
  }

  /** Enqueues payloads in pending/ that no non-terminal job references. */
  async adoptOrphans(): Promise<string[]> {
    const files = await this.deps.payloads.listPending();
    if (files.length === 0) return [];

    const active = await this.deps.ledger.listByState(ACTIVE_STATES);
    const referenced = new Set(active.map((job) => resolve(job.payloadPath)));
    const cutoff = this.clock.now().getTime() - ORPHAN_MIN_AGE_MS;

    const adopted: string[] = [];
    for (const file of files) {
      if (referenced.has(resolve(file.path))) continue;
      if (file.modifiedAt.getTime() > cutoff) continue;
      adopted.push(await this.enqueue(`orphan:${file.path}`, file.path));
    }
    if (adopted.length > 0) logger.warn({ adopted: adopted.length }, 'Adopted orphaned payloads');
    return adopted;
  }

  /**
   * Recovers stranded jobs, then drains the queue, waiting out retry delays,
   * until every job is terminal or stop() is called.
   */
  async runOnce(): Promise<DrainSummary> {
    await this.recover();

    const summary = emptySummary();
    const tally = (outcome: JobOutcome): void => {
      if (outcome === 'succeeded') summary.succeeded++;
      else if (outcome === 'duplicate') summary.duplicates++;
      else if (outcome === 'retrying') summary.retried++;
      else if (outcome === 'failed') summary.failed++;
      else summary.stranded++;
    };

    while (!this.stopping) {
      const queued = await this.deps.ledger.listByState(['pending', 'retrying']);
      const now = this.clock.now();
      await this.dispatch(queued, now, tally);

      if (this.inFlight.size > 0) {
        await this.waitForProgress();
        continue;
      }
      if (queued.length === 0) break;

      const wakeAt = this.nextWakeTime(queued, now);
      await this.sleepIdle(wakeAt - now.getTime());
    }

    while (this.inFlight.size > 0 && !this.stopping) {
      await this.waitForProgress();
    }

    const active = await this.deps.ledger.listByState(ACTIVE_STATES);
    summary.remaining = active.length;
    return summary;
  }

  /** Per poll interval: adopt orphans, drain, sweep. Returns after stop(). */
  runForever(): Promise<void> {
    if (this.forever) return this.forever;
    this.forever = this.loop().finally(() => {
      this.forever = undefined;
    });
    return this.forever;
  }

  private async loop(): Promise<void> {
    this.running = true;
    try {
      while (!this.stopping) {
        try {
          await this.adoptOrphans();
          const summary = await this.runOnce();
          if (summary.succeeded + summary.duplicates + summary.failed + summary.stranded > 0) {
            logger.info(summary, 'Queue drained');
          }
          if (this.deps.retention) await this.deps.retention.sweep(this.clock.now());
        } catch (error) {
          logger.error({ err: error }, 'Queue cycle failed; trying again after the poll interval');
        }
        await this.sleepIdle(this.deps.config.pollIntervalMs);
      }
    } finally {
      this.running = false;
    }
  }

  /**
   * Stops dispatching and waits up to `graceMs` for in-flight attempts. Jobs
   * still running after that are released to retrying without charging the
   * attempt.
   */
  async stop(graceMs: number = this.deps.config.shutdownGraceMs): Promise<void> {
    this.halted.abort();
    this.wake();

    const pending = [...this.inFlight.values()];
    if (pending.length > 0) {
      const timer = new AbortController();
      const finished = await Promise.race([
        Promise.allSettled(pending.map((entry) => entry.done)).then(() => true),
        this.clock.sleep(graceMs, timer.signal).then(() => false),
      ]);
      timer.abort();

      if (!finished) {
        for (const { job } of this.inFlight.values()) {
          await this.release(job, 'Attempt abandoned at shutdown');
        }
        logger.warn({ released: this.inFlight.size }, 'Released in-flight jobs at shutdown');
      }
    }

    if (this.forever) await this.forever;
  }

  /** Enqueues a copy of a failed job's payload as a new job. */
  async requeue(jobId: string): Promise<Job> {
    const job = await this.deps.ledger.get(jobId);
    if (!job) throw new NotFoundError('Job', jobId);
    if (job.state !== 'failed') {
      throw new ConflictError(`Job '${jobId}' is ${job.state}; only failed jobs can be requeued`);
    }

    const payloadPath = await this.deps.payloads.restoreFromErrors(job);
    const newId = await this.enqueue(`requeue:${job.id}`, payloadPath);
    const created = await this.deps.ledger.get(newId);
    if (!created) throw new NotFoundError('Job', newId);
    logger.info({ jobId: newId, requeuedFrom: job.id }, 'Failed job requeued');
    return created;
  }

  async status(): Promise<QueueStatus> {
    return {
      running: this.running,
      inFlight: this.inFlight.size,
      counts: await this.deps.ledger.countByState(),
    };
  }

  private async dispatch(queued: Job[], now: Date, tally: (outcome: JobOutcome) => void): Promise<void> {
    const limit = this.deps.config.maxConcurrentJobs;
    // Strict order: only the oldest non-terminal job may run.
    const candidates = limit === 1 ? queued.slice(0, 1) : queued;

    for (const job of candidates) {
      if (this.inFlight.size >= limit || this.stopping) return;
      if (this.inFlight.has(job.id) || !isDue(job, now)) continue;

      const claimed = await this.deps.ledger.compareAndSet(job.id, job.state, {
        state: 'processing',
        attemptCount: job.attemptCount + 1,
        nextAttemptAt: null,
      });
      if (!claimed) continue;

      const done = this.execute(claimed)
        .then((outcome) => {
          tally(outcome);
          return outcome;
        })
        .finally(() => {
          this.inFlight.delete(claimed.id);
        });
      this.inFlight.set(claimed.id, { job: claimed, done });
    }
  }

  private nextWakeTime(queued: Job[], now: Date): number {
    const waiting = this.deps.config.maxConcurrentJobs === 1 ? queued.slice(0, 1) : queued;
    let wakeAt = Number.POSITIVE_INFINITY;
    for (const job of waiting) {
      const at = job.nextAttemptAt?.getTime() ?? now.getTime();
      if (at < wakeAt) wakeAt = at;
    }
    return Number.isFinite(wakeAt) ? wakeAt : now.getTime();
  }

  private async execute(job: Job): Promise<JobOutcome> {
    const log = logger.child({ jobId: job.id, sourceRef: job.sourceRef, attempt: job.attemptCount });
    log.info('Attempt started');

    const result = await this.attempt(job, log);
    try {
      return await this.settle(job, result, log);
    } catch (error) {
      log.error({ err: error }, 'Could not record job outcome');
    }

    try {
      const delayMs = backoffDelayMs(job.attemptCount, this.policy);
      if (await this.release(job, 'Outcome could not be recorded', { refund: false, delayMs })) {
        log.warn({ delayMs }, 'Attempt rescheduled after a bookkeeping failure');
        return 'retrying';
      }
    } catch (error) {
      log.error({ err: error }, 'Could not reschedule job; it stays processing until the next drain recovers it');
    }
    return 'stranded';
  }

  private async attempt(job: Job, log: Logger): Promise<AttemptResult> {
    let contentHash = job.contentHash;
    try {
      const payload = await this.deps.payloads.resolve(job);
      if (!payload) throw new PermanentStorageError(`Payload missing: ${job.payloadPath}`);
      if (payload.alreadyProcessed) log.info({ payloadPath: payload.path }, 'Payload already moved by an earlier attempt');

      const computed = this.deps.files.fingerprint(payload.bytes);
      if (contentHash !== null && contentHash !== computed) {
        throw new PermanentStorageError('Payload changed after its fingerprint was recorded');
      }
      if (contentHash === null) {
        contentHash = computed;
        await this.deps.ledger.compareAndSet(job.id, 'processing', { contentHash });
      }

      const duplicate = await this.deps.files.findDuplicate(contentHash);
      if (duplicate) return { kind: 'duplicate', contentHash, duplicateOf: duplicate.jobId };

      const parsed = await this.deps.files.parse(payload.bytes, { jobId: job.id });
      const records = [...parsed.records];
      if (parsed.warnings.length > 0) {
        log.warn(
          { dropped: parsed.warnings.length, first: parsed.warnings.slice(0, 5) },
          'Rows dropped during validation',
        );
      }

      const keys = records.map((record) => record.uniqueKey);
      await this.locks.acquire(job.id, keys);
      try {
        const earlier = await this.deps.dedup.lastCommittedAt(keys);
        if (earlier.size > 0) log.info({ overwritten: earlier.size }, 'Batch overwrites keys from earlier files');

        const committedCount = await withTimeout(
          (signal) => this.deps.loader.load(records, { jobId: job.id, signal }),
          this.deps.config.jobTimeoutMs,
          `Load for job ${job.id}`,
        );
        return { kind: 'loaded', contentHash, committedCount, keys };
      } finally {
        this.locks.release(job.id);
      }
    } catch (error) {
      return { kind: 'failed', failure: toJobFailure(error), contentHash };
    }
  }

  private async settle(job: Job, result: AttemptResult, log: Logger): Promise<JobOutcome> {
    const { dedup, payloads } = this.deps;

    if (result.kind === 'loaded') {
      await dedup.recordFile({ contentHash: result.contentHash, jobId: job.id, terminalState: 'succeeded' });
      await dedup.recordKeys(result.keys, job.id);
      const payloadPath = await payloads.moveToProcessed(job);
      await this.finish(job, {
        state: 'succeeded',
        payloadPath,
        committedCount: result.committedCount,
        lastError: null,
        lastErrorKind: null,
      });
      log.info({ committed: result.committedCount }, 'Job succeeded');
      return 'succeeded';
    }

    if (result.kind === 'duplicate') {
      const payloadPath = await payloads.moveToProcessed(job);
      await this.finish(job, { state: 'succeeded', payloadPath, committedCount: 0, lastError: null, lastErrorKind: null });
      log.info({ contentHash: result.contentHash, duplicateOf: result.duplicateOf }, 'Duplicate file skipped');
      return 'duplicate';
    }

    const { failure } = result;
    const now = this.clock.now();

    if (failure.kind === 'transient' && job.attemptCount < this.deps.config.maxRetries) {
      const delayMs = backoffDelayMs(job.attemptCount, this.policy);
      const nextAttemptAt = new Date(now.getTime() + delayMs);
      await this.finish(job, {
        state: 'retrying',
        lastError: failure.message,
        lastErrorKind: failure.kind,
        nextAttemptAt,
      });
      log.warn({ error: failure.message, delayMs, nextAttemptAt }, 'Attempt failed; retry scheduled');
      return 'retrying';
    }

    const payloadPath = await payloads.moveToErrors(job, {
      failure,
      attemptCount: job.attemptCount,
      failedAt: now.toISOString(),
    });
    if (result.contentHash !== null) {
      await dedup.recordFile({ contentHash: result.contentHash, jobId: job.id, terminalState: 'failed' });
    }
    await this.finish(job, {
      state: 'failed',
      payloadPath,
      lastError: failure.message,
      lastErrorKind: failure.kind,
      nextAttemptAt: null,
    });
    log.error({ kind: failure.kind, error: failure.message, attempts: job.attemptCount }, 'Job failed');
    return 'failed';
  }

  private async finish(job: Job, patch: JobPatch): Promise<void> {
    const updated = await this.deps.ledger.compareAndSet(job.id, 'processing', patch);
    if (!updated) throw new Error(`Job ${job.id} is no longer processing; outcome ${patch.state} not recorded`);
  }

  /**
   * processing → retrying. By default the interrupted attempt is refunded and
   * the job is due now.
   */
  private async release(
    job: Job,
    reason: string,
    options: { refund: boolean; delayMs: number } = { refund: true, delayMs: 0 },
  ): Promise<boolean> {
    const released = await this.deps.ledger.compareAndSet(job.id, 'processing', {
      state: 'retrying',
      attemptCount: options.refund ? Math.max(0, job.attemptCount - 1) : job.attemptCount,
      nextAttemptAt: new Date(this.clock.now().getTime() + options.delayMs),
      lastError: reason,
      lastErrorKind: 'transient',
    });
    return released !== undefined;
  }

  private get stopping(): boolean {
    return this.halted.signal.aborted;
  }

  /** Resolves when any in-flight attempt settles or stop() is called. */
  private async waitForProgress(): Promise<void> {
    const signal = this.halted.signal;
    if (signal.aborted) return;

    let onAbort = (): void => undefined;
    const aborted = new Promise<void>((resolve) => {
      onAbort = () => resolve();
      signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
      await Promise.race([...[...this.inFlight.values()].map((entry) => entry.done), aborted]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async sleepIdle(ms: number): Promise<void> {
    if (this.stopping) return;
    if (this.wakeRequested) {
      this.wakeRequested = false;
      return;
    }
    const idle = new AbortController();
    this.idle = idle;
    try {
      await this.clock.sleep(ms, idle.signal);
    } finally {
      if (this.idle === idle) this.idle = undefined;
    }
  }

  /** Cuts the current idle wait short, or the next one if nothing is waiting. */
  private wake(): void {
    if (this.idle) this.idle.abort();
    else this.wakeRequested = true;
  }
}
