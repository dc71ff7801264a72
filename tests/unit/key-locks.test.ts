import { describe, expect, it } from 'vitest';
import { KeyLockTable } from '../../src/services/queue/key-locks.js';

function track(promise: Promise<void>) {
  const state = { granted: false };
  void promise.then(() => {
    state.granted = true;
  });
  return state;
}

async function settle(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}

describe('KeyLockTable', () => {
  it('admits disjoint key sets at once', async () => {
    const locks = new KeyLockTable();
    const a = track(locks.acquire('a', ['k1', 'k2']));
    const b = track(locks.acquire('b', ['k3']));
    await settle();

    expect(a.granted).toBe(true);
    expect(b.granted).toBe(true);
    expect(locks.heldCount).toBe(2);
  });

  it('makes overlapping jobs wait in arrival order', async () => {
    const locks = new KeyLockTable();
    await locks.acquire('a', ['k1', 'k2']);
    const c = track(locks.acquire('c', ['k2']));
    const d = track(locks.acquire('d', ['k4']));
    const e = track(locks.acquire('e', ['k2', 'k5']));
    await settle();

    expect(c.granted).toBe(false);
    expect(d.granted).toBe(true);
    expect(e.granted).toBe(false);
    expect(locks.waitingCount).toBe(2);

    locks.release('a');
    await settle();
    expect(c.granted).toBe(true);
    expect(e.granted).toBe(false);

    locks.release('c');
    await settle();
    expect(e.granted).toBe(true);
    expect(locks.waitingCount).toBe(0);
    expect(locks.heldCount).toBe(2);
  });

  it('does not let a later job overtake an earlier waiter on the same key', async () => {
    const locks = new KeyLockTable();
    await locks.acquire('a', ['k1']);
    const b = track(locks.acquire('b', ['k1', 'k2']));
    const c = track(locks.acquire('c', ['k2']));
    await settle();

    expect(b.granted).toBe(false);
    expect(c.granted).toBe(false);

    locks.release('a');
    await settle();
    expect(b.granted).toBe(true);
    expect(c.granted).toBe(false);
  });

  it('forgets a waiter that gives up', async () => {
    const locks = new KeyLockTable();
    await locks.acquire('a', ['k1']);
    void locks.acquire('b', ['k1']);

    locks.release('b');
    expect(locks.waitingCount).toBe(0);
  });
});
