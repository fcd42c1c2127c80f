// tRPC request context
//
// Creates the context available to all tRPC procedures.
// Includes the session repository, logger, and server configuration.

import type { SessionRepository } from '@campaign-demand/repositories';
import type { Logger } from '@campaign-demand/runtime';
import type { ServerConfig } from '../config.js';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  /** Loaded campaign tables, one per session */
  sessions: SessionRepository;

  /** Structured logger */
  logger: Logger;

  /** Server configuration */
  config: ServerConfig;
};

/**
 * Create a context factory for the HTTP adapter.
 *
 * Every request sees the same session repository; all other state is
 * built per procedure call.
 */
export function createContextFactory(deps: Context): () => Promise<Context> {
  return async () => ({
    sessions: deps.sessions,
    logger: deps.logger,
    config: deps.config,
  });
}
