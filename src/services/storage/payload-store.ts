import { access, copyFile, mkdir, open, readdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { constants } from 'fs';
import { basename, extname, join } from 'path';
import { nanoid } from 'nanoid';
import type { StorageConfig } from '../../config/index.js';
import type { JobFailure } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';

export const PAYLOAD_EXTENSION = '.xlsx';

export interface ResolvedPayload {
  path: string;
  bytes: Buffer;
  /** The payload was already moved to processed/ by an earlier, interrupted attempt. */
  alreadyProcessed: boolean;
}

export interface PendingFile {
  path: string;
  modifiedAt: Date;
}

export interface DeadLetterRecord {
  jobId: string;
  sourceRef: string;
  failure: JobFailure;
  attemptCount: number;
  failedAt: string;
}

interface JobRef {
  id: string;
  sourceRef: string;
  payloadPath: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/** Keeps the original name readable but safe as a single path segment. */
export function safeFileName(name: string): string {
  const base = basename(name).replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '');
  return base === '' ? `attachment${PAYLOAD_EXTENSION}` : base;
}

/**
 * The three payload areas: pending/ (not yet terminal), processed/<job id>/
 * (succeeded and duplicates), errors/<job id>/ (dead letter).
 */
export class PayloadStore {
  constructor(private readonly dirs: StorageConfig) {}

  get pendingDir(): string {
    return this.dirs.pendingDir;
  }

  get processedDir(): string {
    return this.dirs.processedDir;
  }

  async ensureLayout(): Promise<void> {
    for (const dir of [this.dirs.pendingDir, this.dirs.processedDir, this.dirs.errorsDir]) {
      await mkdir(dir, { recursive: true });
    }
  }

  /** Throws unless every area accepts a write. */
  async checkWritable(): Promise<void> {
    await this.ensureLayout();
    for (const dir of [this.dirs.pendingDir, this.dirs.processedDir, this.dirs.errorsDir]) {
      const probe = join(dir, `.probe-${nanoid(8)}`);
      await writeFile(probe, '');
      await rm(probe, { force: true });
    }
  }

  /**
   * Writes an attachment into pending/ durably: data is flushed to a hidden
   * temp file, then renamed into place, so a listed payload is always complete.
   */
  async writePending(fileName: string, bytes: Buffer): Promise<string> {
    await mkdir(this.dirs.pendingDir, { recursive: true });

    const name = `${Date.now()}_${nanoid(8)}_${safeFileName(fileName)}`;
    const finalPath = join(this.dirs.pendingDir, name);
    const tempPath = join(this.dirs.pendingDir, `.${name}.part`);

    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(bytes);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, finalPath);
    return finalPath;
  }

  /** Complete payload files waiting in pending/, oldest name first. */
  async listPending(): Promise<PendingFile[]> {
    const entries = await readdir(this.dirs.pendingDir, { withFileTypes: true });
    const paths = entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
      .filter((entry) => extname(entry.name).toLowerCase() === PAYLOAD_EXTENSION)
      .map((entry) => join(this.dirs.pendingDir, entry.name))
      .sort();

    const files: PendingFile[] = [];
    for (const path of paths) {
      const info = await stat(path);
      files.push({ path, modifiedAt: info.mtime });
    }
    return files;
  }

  processedPathFor(job: JobRef): string {
    return join(this.dirs.processedDir, job.id, basename(job.payloadPath));
  }

  errorPathFor(job: JobRef): string {
    return join(this.dirs.errorsDir, job.id, basename(job.payloadPath));
  }

  /**
   * Reads the payload from where the job says it is, falling back to the
   * processed/ location an interrupted attempt may already have moved it to.
   * Returns undefined if the payload is nowhere.
   */
  async resolve(job: JobRef): Promise<ResolvedPayload | undefined> {
    if (await exists(job.payloadPath)) {
      return { path: job.payloadPath, bytes: await readFile(job.payloadPath), alreadyProcessed: false };
    }
    const processed = this.processedPathFor(job);
    if (processed !== job.payloadPath && (await exists(processed))) {
      return { path: processed, bytes: await readFile(processed), alreadyProcessed: true };
    }
    return undefined;
  }

  async moveToProcessed(job: JobRef): Promise<string> {
    const destination = this.processedPathFor(job);
    if (destination === job.payloadPath) return destination;

    if (await exists(job.payloadPath)) {
      await mkdir(join(this.dirs.processedDir, job.id), { recursive: true });
      await rename(job.payloadPath, destination);
      logger.debug({ jobId: job.id, from: job.payloadPath, to: destination }, 'Payload moved to processed');
    } else if (!(await exists(destination))) {
      throw new Error(`Payload for job ${job.id} is missing: ${job.payloadPath}`);
    }
    return destination;
  }

  /**
   * Moves the payload to errors/<job id>/ and writes the failure beside it as
   * `<name>.error.json`. A missing payload still gets its error record.
   */
  async moveToErrors(job: JobRef, record: Omit<DeadLetterRecord, 'jobId' | 'sourceRef'>): Promise<string> {
    const destination = this.errorPathFor(job);
    await mkdir(join(this.dirs.errorsDir, job.id), { recursive: true });

    if (await exists(job.payloadPath)) {
      await rename(job.payloadPath, destination);
    } else {
      logger.warn({ jobId: job.id, payloadPath: job.payloadPath }, 'Dead-lettering job without payload');
    }

    const deadLetter: DeadLetterRecord = { jobId: job.id, sourceRef: job.sourceRef, ...record };
    await writeFile(`${destination}.error.json`, JSON.stringify(deadLetter, null, 2));
    return destination;
  }

  /** Copies a dead-lettered payload back into pending/ for a fresh job. */
  async restoreFromErrors(job: JobRef): Promise<string> {
    const source = (await exists(job.payloadPath)) ? job.payloadPath : this.errorPathFor(job);
    if (!(await exists(source))) {
      throw new Error(`Dead-lettered payload for job ${job.id} is missing`);
    }

    await mkdir(this.dirs.pendingDir, { recursive: true });
    const name = `${Date.now()}_${nanoid(8)}_${basename(source)}`;
    const tempPath = join(this.dirs.pendingDir, `.${name}.part`);
    const finalPath = join(this.dirs.pendingDir, name);
    await copyFile(source, tempPath);
    await rename(tempPath, finalPath);
    return finalPath;
  }
}
