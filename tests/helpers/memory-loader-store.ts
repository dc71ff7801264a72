import type { LoadPlan } from '../../src/services/loader/statements.js';
import type { LoaderSession, LoaderStore, StagedRow } from '../../src/services/loader/store.js';

export type TargetRow = Record<string, string | null>;
export type StorePhase = 'begin' | 'createStaging' | 'insertStaging' | 'upsert' | 'dropStaging';

/** An error shaped like the ones postgres.js throws. */
export function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

/**
 * Target table held in memory. Each transaction works on a copy that replaces
 * the table only when the work resolves, so a failure leaves no trace.
 */
export class MemoryLoaderStore implements LoaderStore {
  readonly target = new Map<string, TargetRow>();
  readonly schemas = new Set<string>();
  readonly stagingTablesCreated: string[] = [];
  transactions = 0;
  commits = 0;
  rollbacks = 0;
  reachable = true;
  private readonly faults: { phase: StorePhase; error: unknown }[] = [];
  private hanging = false;

  /** The next time `phase` runs, it throws `error`. Faults queue up. */
  failAt(phase: StorePhase, error: unknown): void {
    this.faults.push({ phase, error });
  }

  /** Every following transaction never settles. */
  hang(): void {
    this.hanging = true;
  }

  async transaction(work: (session: LoaderSession) => Promise<number>): Promise<number> {
    this.transactions++;
    if (this.hanging) return new Promise<number>(() => undefined);

    const working = new Map<string, TargetRow>();
    for (const [key, row] of this.target) working.set(key, { ...row });
    const staging = new Map<string, StagedRow[]>();

    const session: LoaderSession = {
      createStaging: async (plan: LoadPlan) => {
        this.maybeFail('createStaging');
        if (staging.has(plan.stagingTable)) throw pgError('42P07', `relation "${plan.stagingTable}" already exists`);
        staging.set(plan.stagingTable, []);
        this.stagingTablesCreated.push(plan.stagingTable);
      },
      insertStaging: async (plan: LoadPlan, rows: readonly StagedRow[]) => {
        this.maybeFail('insertStaging');
        const table = staging.get(plan.stagingTable);
        if (!table) throw pgError('42P01', `relation "${plan.stagingTable}" does not exist`);
        table.push(...rows);
      },
      upsert: async (plan: LoadPlan) => {
        this.maybeFail('upsert');
        const table = staging.get(plan.stagingTable) ?? [];
        const keyIndex = plan.columns.indexOf(plan.uniqueKey);
        const processedAt = new Date().toISOString();
        for (const row of table) {
          const record: TargetRow = {};
          plan.columns.forEach((column, i) => {
            record[column] = row[i] ?? null;
          });
          record.processed_at = processedAt;
          working.set(String(row[keyIndex]), record);
        }
        return table.length;
      },
      dropStaging: async (plan: LoadPlan) => {
        this.maybeFail('dropStaging');
        staging.delete(plan.stagingTable);
      },
    };

    try {
      this.maybeFail('begin');
      const result = await work(session);
      this.target.clear();
      for (const [key, row] of working) this.target.set(key, row);
      this.commits++;
      return result;
    } catch (error) {
      this.rollbacks++;
      throw error;
    }
  }

  async ensureStagingSchema(schema: string): Promise<void> {
    this.schemas.add(schema);
  }

  async ping(): Promise<void> {
    if (!this.reachable) throw pgError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5432');
  }

  private maybeFail(phase: StorePhase): void {
    const index = this.faults.findIndex((fault) => fault.phase === phase);
    if (index === -1) return;
    const [fault] = this.faults.splice(index, 1);
    if (fault) throw fault.error;
  }
}
