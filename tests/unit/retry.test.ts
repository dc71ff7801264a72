import { describe, expect, it } from 'vitest';
import { TransientStorageError } from '../../src/lib/errors.js';
import { backoffDelayMs, withTimeout } from '../../src/lib/retry.js';

describe('backoffDelayMs', () => {
  const policy = { baseSeconds: 2, maxDelaySeconds: 300 };

  it('grows exponentially with the attempt count', () => {
    expect(backoffDelayMs(0, policy)).toBe(1000);
    expect(backoffDelayMs(1, policy)).toBe(2000);
    expect(backoffDelayMs(3, policy)).toBe(8000);
  });

  it('never exceeds the maximum delay', () => {
    expect(backoffDelayMs(10, policy)).toBe(300_000);
    expect(backoffDelayMs(50, policy)).toBe(300_000);
  });

  it('treats a negative attempt as the first', () => {
    expect(backoffDelayMs(-1, policy)).toBe(1000);
  });
});

describe('withTimeout', () => {
  it('passes the result through', async () => {
    await expect(withTimeout(async () => 7, 50, 'quick')).resolves.toBe(7);
  });

  it('passes the original rejection through', async () => {
    const failure = new Error('broken');
    await expect(withTimeout(() => Promise.reject(failure), 50, 'quick')).rejects.toBe(failure);
  });

  it('turns an overrun into a transient storage error', async () => {
    let seen: AbortSignal | undefined;
    const result = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<number>(() => undefined);
      },
      20,
      'slow thing',
    );

    await expect(result).rejects.toBeInstanceOf(TransientStorageError);
    await expect(result).rejects.toThrow('slow thing timed out after 20ms');
    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(TransientStorageError);
  });

  it('leaves the signal alone when the work finishes in time', async () => {
    let seen: AbortSignal | undefined;
    await withTimeout(
      async (signal) => {
        seen = signal;
        return 1;
      },
      50,
      'quick',
    );
    expect(seen?.aborted).toBe(false);
  });
});
