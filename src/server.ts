// Entry point: loads .env, opens the database and starts the HTTP server

import 'dotenv/config';
import http from 'node:http';
import { createApp } from './app.js';
import { getJwtSecret, getPort } from './config.js';
import { closeDatabase, getDb } from './db.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('server');

function main(): void {
  log.info('Starting task API...');

  // Fail at startup rather than on the first login
  getJwtSecret();
  getDb();

  const app = createApp();
  const server = http.createServer(app);
  const port = getPort();

  server.listen(port, () => {
    log.info(`Server running at http://localhost:${port}`);
  });

  const shutdown = (): void => {
    log.info('Shutting down...');
    server.close((err) => {
      closeDatabase();
      if (err) {
        log.error(`Error while closing server: ${err.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  log.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
