// @campaign-demand/repositories
// Session storage for loaded campaign tables.
//
// Interfaces define WHAT operations are available; the in-memory
// implementation is the one the server uses.

export * from './interfaces/index.js';
export {
  createInMemorySessionRepository,
  DEFAULT_SESSION_TTL_MINUTES,
  type InMemorySessionRepository,
  type InMemorySessionRepositoryOptions,
} from './in-memory/index.js';
