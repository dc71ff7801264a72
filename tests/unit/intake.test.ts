import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Intake } from '../../src/services/intake/index.js';
import { PayloadStore } from '../../src/services/storage/payload-store.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'intake-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('Intake', () => {
  it('persists the attachment before enqueueing it', async () => {
    const payloads = new PayloadStore({
      baseDir: dir,
      pendingDir: join(dir, 'pending'),
      processedDir: join(dir, 'processed'),
      errorsDir: join(dir, 'errors'),
      retentionDays: 30,
    });
    const enqueue = vi.fn(async (_sourceRef: string, payloadPath: string) => {
      expect(await readFile(payloadPath, 'utf8')).toBe('sheet');
      return 'job-1';
    });

    const jobId = await new Intake(payloads, { enqueue }).admit({
      rawBytes: Buffer.from('sheet'),
      sourceRef: 'mail:7',
      receivedAt: new Date('2026-01-05T08:00:00.000Z'),
      filename: 'daily.xlsx',
    });

    expect(jobId).toBe('job-1');
    const [written] = await readdir(join(dir, 'pending'));
    expect(enqueue).toHaveBeenCalledWith('mail:7', join(dir, 'pending', written ?? ''));
  });

  it('enqueues nothing when the payload cannot be written', async () => {
    const payloads = new PayloadStore({
      baseDir: dir,
      pendingDir: join(dir, 'pending', '\0bad'),
      processedDir: join(dir, 'processed'),
      errorsDir: join(dir, 'errors'),
      retentionDays: 30,
    });
    const enqueue = vi.fn(async () => 'job-1');

    await expect(
      new Intake(payloads, { enqueue }).admit({
        rawBytes: Buffer.from('sheet'),
        sourceRef: 'mail:8',
        receivedAt: new Date(),
        filename: 'daily.xlsx',
      }),
    ).rejects.toThrow();
    expect(enqueue).not.toHaveBeenCalled();
  });
});
