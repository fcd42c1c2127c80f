// HTTP server - the tRPC router on the standalone Node adapter

import { createHTTPServer } from '@trpc/server/adapters/standalone';
import type { SessionRepository } from '@campaign-demand/repositories';
import { describeError, type Logger } from '@campaign-demand/runtime';
import type { ServerConfig } from './lib/config.js';
import { createContextFactory } from './lib/trpc/context.js';
import { appRouter } from './lib/trpc/routers/index.js';

export type CreateServerOptions = {
  config: ServerConfig;
  logger: Logger;
  sessions: SessionRepository;
};

/**
 * Build the HTTP server. Call `listen` on the result to start serving.
 *
 * Client errors are logged as warnings, everything else as errors.
 */
export function createServer(options: CreateServerOptions) {
  const { config, logger, sessions } = options;

  return createHTTPServer({
    router: appRouter,
    createContext: createContextFactory({ config, logger, sessions }),
    onError({ error, path, type }) {
      const details = { path: path ?? null, type, code: error.code, ...describeError(error) };
      if (error.code === 'INTERNAL_SERVER_ERROR') {
        logger.error('Request failed', details);
      } else {
        logger.warn('Request rejected', details);
      }
    },
  });
}
