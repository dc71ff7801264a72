import { buildApp } from './api/index.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { createContainer, postgresBackends, type ServiceContainer } from './container.js';
import { createDatabase, type Database } from './db/index.js';
import { ConfigError, errorMessage } from './lib/errors.js';
import { logger, setLogLevel } from './lib/logger.js';

const COMMANDS = ['run', 'once', 'check'] as const;
type Command = (typeof COMMANDS)[number];

function parseCommand(arg: string | undefined): Command {
  const command = arg ?? 'run';
  const match = COMMANDS.find((candidate) => candidate === command);
  if (!match) throw new ConfigError(`Unknown command '${command}'; expected one of ${COMMANDS.join(', ')}`);
  return match;
}

/** Database reachable and every storage area writable. */
async function check(container: ServiceContainer): Promise<number> {
  let healthy = true;

  try {
    await container.loader.ping();
    logger.info('Database reachable');
  } catch (error) {
    healthy = false;
    logger.error({ err: error }, 'Database unreachable');
  }

  try {
    await container.payloads.checkWritable();
    logger.info({ baseDir: container.config.storage.baseDir }, 'Storage writable');
  } catch (error) {
    healthy = false;
    logger.error({ err: error }, 'Storage not writable');
  }

  return healthy ? 0 : 1;
}

async function once(container: ServiceContainer): Promise<number> {
  const { queue } = container;
  const interrupt = () => {
    logger.info('Interrupted, stopping after in-flight jobs');
    queue.stop().catch((error: unknown) => logger.error({ err: error }, 'Stop failed'));
  };
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  try {
    await container.payloads.ensureLayout();
    await container.loader.prepare();
    await queue.adoptOrphans();
    const summary = await queue.runOnce();
    await container.retention.sweep();

    const { counts } = await queue.status();
    logger.info({ ...summary, counts }, 'Single pass finished');
    return counts.processing + counts.retrying === 0 ? 0 : 1;
  } finally {
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
  }
}

async function run(container: ServiceContainer, config: Readonly<AppConfig>, database: Database): Promise<void> {
  const { queue } = container;
  await container.payloads.ensureLayout();
  await container.loader.prepare();

  // Ops API
  const app = config.api.apiKey ? await buildApp(config.api.apiKey, container) : undefined;
  if (app) {
    await app.listen({ port: config.api.port, host: '0.0.0.0' });
    logger.info({ port: config.api.port }, 'Ops API started');
  } else {
    logger.info('API_KEY not set; ops API disabled');
  }

  const worker = queue.runForever();
  logger.info({ baseDir: config.storage.baseDir, concurrency: config.queue.maxConcurrentJobs }, 'Queue processor started');

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');
    try {
      await queue.stop();
      if (app) await app.close();
      await database.close();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await worker;
}

async function main(): Promise<number> {
  const command = parseCommand(process.argv[2]);
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const database = createDatabase(config.database);
  const container = createContainer(config, postgresBackends(database, config));

  if (command === 'run') {
    await run(container, config, database);
    return 0;
  }

  try {
    return command === 'check' ? await check(container) : await once(container);
  } finally {
    await database.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, errorMessage(error));
    } else {
      logger.fatal({ err: error }, 'Failed to start');
    }
    process.exit(1);
  });
