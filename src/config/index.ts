import { resolve, join } from 'path';
import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import type { LogLevel } from '../lib/logger.js';

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

/** Header and column names compare after trimming, lower-casing and joining words with `_`. */
export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '_');
}

const columnList = z
  .string()
  .default('')
  .transform((value) => value.split(',').map(normalizeColumnName).filter(Boolean));

const identifier = (label: string) =>
  z
    .string()
    .min(1, `${label} is required`)
    .transform(normalizeColumnName)
    .refine((value) => IDENTIFIER.test(value), `${label} must be a plain SQL identifier`);

const qualifiedName = (label: string) =>
  z
    .string()
    .min(1, `${label} is required`)
    .transform((value) => value.trim().toLowerCase())
    .refine(
      (value) => value.split('.').length <= 2 && value.split('.').every((part) => IDENTIFIER.test(part)),
      `${label} must be "table" or "schema.table"`,
    );

const envSchema = z.object({
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().min(1, 'DB_NAME is required'),
  DB_USERNAME: z.string().min(1, 'DB_USERNAME is required'),
  DB_PASSWORD: z.string().default(''),
  DB_STAGING_SCHEMA: identifier('DB_STAGING_SCHEMA').default('temp_processing'),
  DB_TARGET_TABLE: qualifiedName('DB_TARGET_TABLE').default('tracking_data'),
  DB_UNIQUE_KEY: identifier('DB_UNIQUE_KEY').default('hawb'),
  DB_CONNECT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(10),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DB_POOL_MAX: z.coerce.number().int().positive().default(5),

  REQUIRED_COLUMNS: columnList,
  OPTIONAL_COLUMNS: columnList,

  APP_BASE_DIR: z.string().min(1).default('./data'),

  MAX_CONCURRENT_JOBS: z.coerce.number().int().min(1).max(32).default(1),
  MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_SECONDS: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_SECONDS: z.coerce.number().positive().default(300),
  JOB_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),
  POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(3600),
  FILE_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  SHUTDOWN_GRACE_SECONDS: z.coerce.number().nonnegative().default(30),

  API_PORT: z.coerce.number().int().positive().default(3000),
  API_KEY: z.string().optional(),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  stagingSchema: string;
  targetTable: string;
  uniqueKey: string;
  connectTimeoutSeconds: number;
  statementTimeoutMs: number;
  poolMax: number;
}

export interface ColumnConfig {
  /** Always starts with the unique key. */
  required: readonly string[];
  optional: readonly string[];
  /** Required then optional, the order fields are carried in. */
  all: readonly string[];
}

export interface StorageConfig {
  baseDir: string;
  pendingDir: string;
  processedDir: string;
  errorsDir: string;
  retentionDays: number;
}

export interface QueueConfig {
  maxConcurrentJobs: number;
  maxRetries: number;
  retryBaseSeconds: number;
  retryMaxDelaySeconds: number;
  jobTimeoutMs: number;
  pollIntervalMs: number;
  shutdownGraceMs: number;
}

export interface AppConfig {
  database: DatabaseConfig;
  columns: ColumnConfig;
  storage: StorageConfig;
  queue: QueueConfig;
  api: { port: number; apiKey: string | undefined };
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) deepFreeze(child);
  }
  return Object.freeze(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;
  const uniqueKey = data.DB_UNIQUE_KEY;

  const required = [uniqueKey, ...data.REQUIRED_COLUMNS.filter((c) => c !== uniqueKey)];
  const optional = data.OPTIONAL_COLUMNS.filter((c) => !required.includes(c));
  const all = [...new Set([...required, ...optional])];

  const badColumns = all.filter((c) => !IDENTIFIER.test(c));
  if (badColumns.length > 0) {
    throw new ConfigError(`Column names must be plain SQL identifiers: ${badColumns.join(', ')}`, badColumns);
  }
  const reserved = all.filter((c) => c === 'processed_at' || c === 'source_job_id');
  if (reserved.length > 0) {
    throw new ConfigError(`Columns reserved for load metadata: ${reserved.join(', ')}`, reserved);
  }

  const baseDir = resolve(data.APP_BASE_DIR);

  return deepFreeze({
    database: {
      host: data.DB_HOST,
      port: data.DB_PORT,
      database: data.DB_NAME,
      username: data.DB_USERNAME,
      password: data.DB_PASSWORD,
      stagingSchema: data.DB_STAGING_SCHEMA,
      targetTable: data.DB_TARGET_TABLE,
      uniqueKey,
      connectTimeoutSeconds: data.DB_CONNECT_TIMEOUT_SECONDS,
      statementTimeoutMs: data.DB_STATEMENT_TIMEOUT_MS,
      poolMax: data.DB_POOL_MAX,
    },
    columns: { required: [...new Set(required)], optional, all },
    storage: {
      baseDir,
      pendingDir: join(baseDir, 'pending'),
      processedDir: join(baseDir, 'processed'),
      errorsDir: join(baseDir, 'errors'),
      retentionDays: data.FILE_RETENTION_DAYS,
    },
    queue: {
      maxConcurrentJobs: data.MAX_CONCURRENT_JOBS,
      maxRetries: data.MAX_RETRIES,
      retryBaseSeconds: data.RETRY_BASE_SECONDS,
      retryMaxDelaySeconds: data.RETRY_MAX_DELAY_SECONDS,
      jobTimeoutMs: Math.round(data.JOB_TIMEOUT_SECONDS * 1000),
      pollIntervalMs: Math.round(data.POLL_INTERVAL_SECONDS * 1000),
      shutdownGraceMs: Math.round(data.SHUTDOWN_GRACE_SECONDS * 1000),
    },
    api: { port: data.API_PORT, apiKey: data.API_KEY || undefined },
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
  });
}
