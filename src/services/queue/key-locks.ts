interface Waiter {
  jobId: string;
  keys: Set<string>;
  grant: () => void;
}

function overlaps(a: Set<string>, b: Set<string>): boolean {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  for (const key of small) if (large.has(key)) return true;
  return false;
}

/**
 * Admission control for concurrent jobs: a job may write only when its key
 * set is disjoint from every running job and from every earlier waiter, so
 * overlapping jobs commit in the order they asked.
 */
export class KeyLockTable {
  private readonly held = new Map<string, Set<string>>();
  private waiters: Waiter[] = [];

  get heldCount(): number {
    return this.held.size;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  acquire(jobId: string, keys: Iterable<string>): Promise<void> {
    const wanted = new Set(keys);
    if (this.isFree(wanted, this.waiters)) {
      this.held.set(jobId, wanted);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push({ jobId, keys: wanted, grant: resolve });
    });
  }

  release(jobId: string): void {
    if (!this.held.delete(jobId)) {
      this.waiters = this.waiters.filter((waiter) => waiter.jobId !== jobId);
      return;
    }

    const stillWaiting: Waiter[] = [];
    for (const waiter of this.waiters) {
      if (this.isFree(waiter.keys, stillWaiting)) {
        this.held.set(waiter.jobId, waiter.keys);
        waiter.grant();
      } else {
        stillWaiting.push(waiter);
      }
    }
    this.waiters = stillWaiting;
  }

  private isFree(keys: Set<string>, earlier: readonly Waiter[]): boolean {
    for (const heldKeys of this.held.values()) if (overlaps(keys, heldKeys)) return false;
    for (const waiter of earlier) if (overlaps(keys, waiter.keys)) return false;
    return true;
  }
}
