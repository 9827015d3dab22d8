/**
 * Process entry point: load configuration, build the engine, serve HTTP and
 * run the periodic assignment sweep until SIGINT or SIGTERM.
 *
 * @module server
 */

import { createApp } from './app.js';
import { loadAccessControlConfig } from './config/accessControlConfig.js';
import { createAccessControlEngine } from './engine.js';
import { loadDirectoryUsers } from './identity/directoryUsersFile.js';
import { createLogger } from './logging/logger.js';

const config = loadAccessControlConfig();
const logger = createLogger({ service: config.serviceName, level: config.logLevel });

const users = config.usersFile ? loadDirectoryUsers(config.usersFile) : [];
const engine = createAccessControlEngine({ config, users, logger });

const app = createApp({
  evaluation: engine.evaluation,
  assignments: engine.assignments,
  identity: engine.identity,
  logger,
});

const stopCleanup = engine.assignments.startPeriodicCleanup();

const server = app.listen(config.port, () => {
  logger.info('Access control service listening', {
    port: config.port,
    users: users.length,
    timeZone: config.timeZone,
  });
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  stopCleanup();
  server.close((err) => {
    if (err) {
      logger.error('HTTP server did not close cleanly', err);
      process.exitCode = 1;
    }
  });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
