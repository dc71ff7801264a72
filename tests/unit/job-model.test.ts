import { describe, expect, it } from 'vitest';
import { assertTransition, canTransition, isTerminal } from '../../src/services/queue/model.js';

describe('job state machine', () => {
  it('only moves forward', () => {
    expect(canTransition('pending', 'processing')).toBe(true);
    expect(canTransition('retrying', 'processing')).toBe(true);
    expect(canTransition('processing', 'succeeded')).toBe(true);
    expect(canTransition('processing', 'retrying')).toBe(true);
    expect(canTransition('processing', 'failed')).toBe(true);

    expect(canTransition('pending', 'succeeded')).toBe(false);
    expect(canTransition('retrying', 'failed')).toBe(false);
    expect(canTransition('succeeded', 'processing')).toBe(false);
    expect(canTransition('failed', 'pending')).toBe(false);
  });

  it('allows field updates on live jobs only', () => {
    expect(canTransition('processing', 'processing')).toBe(true);
    expect(canTransition('succeeded', 'succeeded')).toBe(false);
    expect(() => assertTransition('j1', 'processing', { contentHash: 'abc' })).not.toThrow();
    expect(() => assertTransition('j1', 'failed', { lastError: 'edited' })).toThrow('Job j1 is failed and can no longer change');
    expect(() => assertTransition('j1', 'pending', { state: 'failed' })).toThrow(
      'Illegal job transition for j1: pending → failed',
    );
  });

  it('knows which states are terminal', () => {
    expect(isTerminal('succeeded')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('retrying')).toBe(false);
  });
});
