import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { DatabaseConfig } from '../config/index.js';
import { logger } from '../lib/logger.js';
import * as schema from './schema/index.js';

export type Db = PostgresJsDatabase<typeof schema>;
export type Sql = postgres.Sql;

export interface Database {
  db: Db;
  sql: Sql;
  close(): Promise<void>;
}

export function createDatabase(config: DatabaseConfig): Database {
  const sql = postgres({
    host: config.host,
    port: config.port,
    database: config.database,
    username: config.username,
    password: config.password,
    max: config.poolMax,
    idle_timeout: 20,
    connect_timeout: config.connectTimeoutSeconds,
    connection: {
      application_name: 'sheet-intake',
      statement_timeout: config.statementTimeoutMs,
    },
    onnotice: (notice) => logger.debug({ notice: notice.message }, 'Postgres notice'),
  });

  const db = drizzle(sql, { schema });

  return {
    db,
    sql,
    close: () => sql.end({ timeout: 5 }),
  };
}

export { schema };
