/**
 * Query API Server
 */

import { config, logger } from '@committee-roster/shared';
import { createApp } from './app';
import { loadRosterStore } from './lib/store';

function main(): void {
  const store = loadRosterStore(config.rosterResultPath);
  const app = createApp(store);

  const server = app.listen(config.queryApiPort, () => {
    logger.info('Query API started', { port: config.queryApiPort, document: config.rosterResultPath });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down query API', { signal });
    server.close(error => {
      if (error) {
        logger.error('Error closing server', error);
        process.exitCode = 1;
      }
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (error) {
  logger.error('Query API failed to start', error, { document: config.rosterResultPath });
  process.exit(1);
}
