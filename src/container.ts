import type { AppConfig } from './config/index.js';
import type { Database } from './db/index.js';
import { PgDedupIndex, type DedupIndex } from './services/dedup-index/index.js';
import { FileProcessor } from './services/file-processor/index.js';
import { Intake } from './services/intake/index.js';
import { DatabaseLoader } from './services/loader/index.js';
import { PgLoaderStore, type LoaderStore } from './services/loader/store.js';
import { QueueProcessor, type Clock, type JobLedger } from './services/queue/index.js';
import { PgJobLedger } from './services/queue/ledger.js';
import { PayloadStore } from './services/storage/payload-store.js';
import { RetentionSweeper } from './services/storage/retention.js';

/** Where jobs, fingerprints and loaded rows live. */
export interface StorageBackends {
  ledger: JobLedger;
  dedup: DedupIndex;
  loaderStore: LoaderStore;
}

export interface ServiceContainer {
  config: Readonly<AppConfig>;
  ledger: JobLedger;
  dedup: DedupIndex;
  payloads: PayloadStore;
  files: FileProcessor;
  loader: DatabaseLoader;
  retention: RetentionSweeper;
  queue: QueueProcessor;
  intake: Intake;
}

export function postgresBackends(database: Database, config: Readonly<AppConfig>): StorageBackends {
  return {
    ledger: new PgJobLedger(database.db),
    dedup: new PgDedupIndex(database.db),
    loaderStore: new PgLoaderStore(database.sql, config.database.statementTimeoutMs),
  };
}

export function createContainer(config: Readonly<AppConfig>, backends: StorageBackends, clock?: Clock): ServiceContainer {
  const { ledger, dedup } = backends;

  const payloads = new PayloadStore(config.storage);
  const files = new FileProcessor(config.columns, dedup);
  const loader = new DatabaseLoader(backends.loaderStore, {
    stagingSchema: config.database.stagingSchema,
    targetTable: config.database.targetTable,
    uniqueKey: config.database.uniqueKey,
    columns: config.columns.all,
  });
  const retention = new RetentionSweeper(config.storage.processedDir, config.storage.retentionDays, ledger);
  const queue = new QueueProcessor({ ledger, dedup, files, loader, payloads, config: config.queue, retention, clock });
  const intake = new Intake(payloads, queue);

  return { config, ledger, dedup, payloads, files, loader, retention, queue, intake };
}
