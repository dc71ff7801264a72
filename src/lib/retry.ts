import { TransientStorageError } from './errors.js';

export interface BackoffPolicy {
  baseSeconds: number;
  maxDelaySeconds: number;
}

/**
 * Delay before the next attempt, in milliseconds: `base^attempt` seconds,
 * capped at `maxDelaySeconds`. `attempt` is the number of attempts made so far.
 */
export function backoffDelayMs(attempt: number, policy: BackoffPolicy): number {
  const seconds = Math.min(Math.pow(policy.baseSeconds, Math.max(attempt, 0)), policy.maxDelaySeconds);
  return Math.round(seconds * 1000);
}

/**
 * Runs `work` against a timer. On overrun the signal handed to `work` is
 * aborted with a TransientStorageError and the same error is thrown; `work`
 * must stop short of committing once the signal fires.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TransientStorageError(`${label} timed out after ${timeoutMs}ms`);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
