import * as dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config/env';
import { createLogger } from './libs/logger';
import { openDatabase, runMigrations } from './services/database.service';
import { SqliteErrorStore } from './adapters/sqlite/SqliteErrorStore';
import { createApp } from './app';

const bootLogger = createLogger();

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const db = openDatabase(config);
  runMigrations(db, logger);

  const store = new SqliteErrorStore(db);
  const app = createApp({ config, logger, store });

  const server = app.listen(config.port, () => logger.info(`API on :${config.port}`));

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    server.close(err => {
      db.close();
      if (err) {
        logger.error({ err }, 'error while closing http server');
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch(err => {
  bootLogger.error({ err }, 'failed to start');
  process.exit(1);
});
