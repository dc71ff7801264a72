import pg from 'pg';
import { loadConfig } from '../src/config/index.js';
import { bootstrapStatements } from '../src/db/bootstrap.js';
import { errorMessage } from '../src/lib/errors.js';

async function main() {
  const config = loadConfig();
  const client = new pg.Client({
    host: config.database.host,
    port: config.database.port,
    database: config.database.database,
    user: config.database.username,
    password: config.database.password,
    connectionTimeoutMillis: config.database.connectTimeoutSeconds * 1000,
  });
  await client.connect();

  let failed = 0;
  for (const sql of bootstrapStatements(config)) {
    try {
      await client.query(sql);
      console.log('OK:', sql.substring(0, 70) + '...');
    } catch (error: unknown) {
      failed++;
      console.error('ERR:', errorMessage(error), '→', sql.substring(0, 70) + '...');
    }
  }

  await client.end();
  console.log(failed === 0 ? '\nBootstrap complete.' : `\nBootstrap finished with ${failed} error(s).`);
  process.exitCode = failed === 0 ? 0 : 1;
}

main().catch((error: unknown) => {
  console.error('Bootstrap failed:', errorMessage(error));
  process.exit(1);
});
