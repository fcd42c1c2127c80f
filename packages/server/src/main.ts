// Server entry point

import { createInMemorySessionRepository } from '@campaign-demand/repositories';
import { consoleLogger, createLevelLogger, describeError } from '@campaign-demand/runtime';
import { loadConfig } from './lib/config.js';
import { createServer } from './server.js';

const PURGE_INTERVAL_MS = 60_000;

const config = loadConfig();
const logger = createLevelLogger(consoleLogger, config.logLevel);
const sessions = createInMemorySessionRepository({ ttlMinutes: config.sessionTtlMinutes });
const server = createServer({ config, logger, sessions });

const purge = setInterval(() => {
  sessions.purgeExpired().then(
    (removed) => {
      if (removed > 0) logger.debug('Expired sessions purged', { removed });
    },
    (error: unknown) => logger.error('Session purge failed', describeError(error))
  );
}, PURGE_INTERVAL_MS);
purge.unref();

server.listen(config.port, config.host, () => {
  logger.info('Server listening', { host: config.host, port: config.port });
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  clearInterval(purge);
  server.close((error) => {
    if (error) {
      logger.error('Server did not close cleanly', describeError(error));
      process.exit(1);
    }
    process.exit(0);
  });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
