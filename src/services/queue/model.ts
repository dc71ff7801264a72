import type { FailureKind } from '../../lib/errors.js';

export const JOB_STATES = ['pending', 'processing', 'succeeded', 'retrying', 'failed'] as const;

export type JobState = (typeof JOB_STATES)[number];

export const TERMINAL_STATES: readonly JobState[] = ['succeeded', 'failed'];
export const ACTIVE_STATES: readonly JobState[] = ['pending', 'processing', 'retrying'];

// processing → retrying is also the edge used by crash recovery and shutdown.
const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  pending: ['processing'],
  retrying: ['processing'],
  processing: ['succeeded', 'retrying', 'failed'],
  succeeded: [],
  failed: [],
};

export function canTransition(from: JobState, to: JobState): boolean {
  return from === to ? !isTerminal(from) : TRANSITIONS[from].includes(to);
}

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.includes(state);
}

export interface Job {
  id: string;
  sequence: number;
  sourceRef: string;
  payloadPath: string;
  contentHash: string | null;
  state: JobState;
  attemptCount: number;
  lastError: string | null;
  lastErrorKind: FailureKind | null;
  nextAttemptAt: Date | null;
  committedCount: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewJob {
  id: string;
  sourceRef: string;
  payloadPath: string;
}

export type JobPatch = Partial<
  Pick<
    Job,
    | 'state'
    | 'payloadPath'
    | 'contentHash'
    | 'attemptCount'
    | 'lastError'
    | 'lastErrorKind'
    | 'nextAttemptAt'
    | 'committedCount'
  >
>;

export type StateCounts = Record<JobState, number>;

export function emptyStateCounts(): StateCounts {
  return { pending: 0, processing: 0, succeeded: 0, retrying: 0, failed: 0 };
}

/**
 * Durable job ledger. Every mutation is a compare-and-set on the job's
 * current state, so two workers can never both believe they own a job.
 */
export interface JobLedger {
  insert(job: NewJob): Promise<Job>;
  get(id: string): Promise<Job | undefined>;
  /**
   * Applies `patch` only if the job is still in `expected`. Returns the
   * updated job, or undefined when the job moved on (or does not exist).
   * Throws if `patch.state` is not a legal transition from `expected`.
   */
  compareAndSet(id: string, expected: JobState, patch: JobPatch): Promise<Job | undefined>;
  /** Jobs in any of `states`, oldest admission first. */
  listByState(states: readonly JobState[]): Promise<Job[]>;
  /** Newest first, for operators. */
  list(options: { state?: JobState; limit: number }): Promise<Job[]>;
  countByState(): Promise<StateCounts>;
}

export function assertTransition(id: string, expected: JobState, patch: JobPatch): void {
  if (patch.state !== undefined && !canTransition(expected, patch.state)) {
    throw new Error(`Illegal job transition for ${id}: ${expected} → ${patch.state}`);
  }
  if (patch.state === undefined && isTerminal(expected)) {
    throw new Error(`Job ${id} is ${expected} and can no longer change`);
  }
}
