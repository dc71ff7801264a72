import { existsSync } from 'fs';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PayloadStore, safeFileName } from '../../src/services/storage/payload-store.js';

let dir: string;
let store: PayloadStore;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'payloads-'));
  store = new PayloadStore({
    baseDir: dir,
    pendingDir: join(dir, 'pending'),
    processedDir: join(dir, 'processed'),
    errorsDir: join(dir, 'errors'),
    retentionDays: 30,
  });
  await store.ensureLayout();
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('safeFileName', () => {
  it('keeps names readable and confined to one path segment', () => {
    expect(safeFileName('Daily Report (1).xlsx')).toBe('Daily_Report_1_.xlsx');
    expect(safeFileName('../../etc/passwd')).toBe('passwd');
    expect(safeFileName('..xlsx')).toBe('xlsx');
    expect(safeFileName('')).toBe('attachment.xlsx');
  });
});

describe('PayloadStore', () => {
  it('writes complete files into pending without leaving temp files', async () => {
    const path = await store.writePending('report.xlsx', Buffer.from('payload'));

    expect(basename(path)).toMatch(/^\d+_[A-Za-z0-9_-]{8}_report\.xlsx$/);
    expect(await readFile(path, 'utf8')).toBe('payload');
    expect(await readdir(join(dir, 'pending'))).toEqual([basename(path)]);
  });

  it('lists only spreadsheet payloads', async () => {
    const kept = await store.writePending('a.xlsx', Buffer.from('a'));
    await writeFile(join(dir, 'pending', 'notes.txt'), 'ignored');
    await writeFile(join(dir, 'pending', '.half.xlsx.part'), 'ignored');

    const pending = await store.listPending();
    expect(pending.map((file) => file.path)).toEqual([kept]);
    expect(pending[0]?.modifiedAt).toBeInstanceOf(Date);
  });

  it('moves a payload to processed and finds it there afterwards', async () => {
    const path = await store.writePending('a.xlsx', Buffer.from('a'));
    const job = { id: 'job-1', sourceRef: 'test', payloadPath: path };

    const moved = await store.moveToProcessed(job);

    expect(moved).toBe(join(dir, 'processed', 'job-1', basename(path)));
    expect(existsSync(path)).toBe(false);
    expect(await store.resolve(job)).toEqual({ path: moved, bytes: Buffer.from('a'), alreadyProcessed: true });
    expect(await store.moveToProcessed(job)).toBe(moved);
  });

  it('fails to move a payload that is nowhere', async () => {
    const job = { id: 'job-2', sourceRef: 'test', payloadPath: join(dir, 'pending', 'missing.xlsx') };
    await expect(store.moveToProcessed(job)).rejects.toThrow(
      `Payload for job job-2 is missing: ${join(dir, 'pending', 'missing.xlsx')}`,
    );
    expect(await store.resolve(job)).toBeUndefined();
  });

  it('dead-letters a payload with its failure beside it', async () => {
    const path = await store.writePending('bad.xlsx', Buffer.from('bad'));
    const job = { id: 'job-3', sourceRef: 'mail:42', payloadPath: path };
    const failure = { kind: 'validation' as const, message: 'Missing required columns: hawb' };

    const dead = await store.moveToErrors(job, { failure, attemptCount: 1, failedAt: '2026-01-05T08:00:00.000Z' });

    expect(dead).toBe(join(dir, 'errors', 'job-3', basename(path)));
    expect(JSON.parse(await readFile(`${dead}.error.json`, 'utf8'))).toEqual({
      jobId: 'job-3',
      sourceRef: 'mail:42',
      failure,
      attemptCount: 1,
      failedAt: '2026-01-05T08:00:00.000Z',
    });
  });

  it('restores a dead-lettered payload as a fresh pending file', async () => {
    const path = await store.writePending('bad.xlsx', Buffer.from('bad'));
    const job = { id: 'job-4', sourceRef: 'test', payloadPath: path };
    const dead = await store.moveToErrors(job, {
      failure: { kind: 'permanent', message: 'x' },
      attemptCount: 1,
      failedAt: '2026-01-05T08:00:00.000Z',
    });

    const restored = await store.restoreFromErrors({ ...job, payloadPath: dead });

    expect(restored.startsWith(join(dir, 'pending'))).toBe(true);
    expect(await readFile(restored, 'utf8')).toBe('bad');
    expect(existsSync(dead)).toBe(true);
  });

  it('checks every area is writable', async () => {
    await expect(store.checkWritable()).resolves.toBeUndefined();
    expect(await readdir(join(dir, 'errors'))).toEqual([]);
  });
});
