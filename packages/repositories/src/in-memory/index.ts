// In-memory session repository
//
// The only session store: campaign tables are never written anywhere
// else. Data does not persist between restarts.

import { randomUUID } from 'node:crypto';
import type { CampaignTable } from '@campaign-demand/protocol';
import type { CampaignSession, SessionRepository } from '../interfaces/index.js';

export const DEFAULT_SESSION_TTL_MINUTES = 60;

/**
 * Options for the in-memory session repository.
 */
export type InMemorySessionRepositoryOptions = {
  /** Session lifetime in minutes (default: 60) */
  ttlMinutes?: number;

  /** Clock override for tests */
  now?: () => Date;

  /** ID generator override for tests */
  generateId?: () => string;
};

/**
 * Extended repository with access to underlying data and clear function.
 */
export interface InMemorySessionRepository extends SessionRepository {
  /** Direct access to the underlying store (for debugging/testing) */
  _data: Map<string, CampaignSession>;
  /** Clear all sessions */
  clear(): void;
}

/**
 * Create an in-memory session repository.
 *
 * Expired sessions are dropped lazily on `get` and in bulk by `purgeExpired`.
 *
 * @example
 * ```typescript
 * const sessions = createInMemorySessionRepository({ ttlMinutes: 30 });
 * const session = await sessions.create(table);
 * const again = await sessions.get(session.id);
 * ```
 */
export function createInMemorySessionRepository(
  options: InMemorySessionRepositoryOptions = {}
): InMemorySessionRepository {
  const {
    ttlMinutes = DEFAULT_SESSION_TTL_MINUTES,
    now = () => new Date(),
    generateId = randomUUID,
  } = options;

  if (!(ttlMinutes > 0)) {
    throw new Error(`Session TTL must be positive, got ${ttlMinutes}`);
  }

  const sessions = new Map<string, CampaignSession>();
  const ttlMs = ttlMinutes * 60 * 1000;

  const isExpired = (session: CampaignSession, at: Date) =>
    session.expiresAt <= at.toISOString();

  return {
    _data: sessions,

    async create(table: CampaignTable) {
      const createdAt = now();
      const session: CampaignSession = {
        id: generateId(),
        table,
        createdAt: createdAt.toISOString(),
        expiresAt: new Date(createdAt.getTime() + ttlMs).toISOString(),
      };
      sessions.set(session.id, session);
      return session;
    },

    async get(id) {
      const session = sessions.get(id);
      if (!session) return null;
      if (isExpired(session, now())) {
        sessions.delete(id);
        return null;
      }
      return session;
    },

    async delete(id) {
      return sessions.delete(id);
    },

    async purgeExpired(at = now()) {
      let removed = 0;
      for (const [id, session] of sessions) {
        if (isExpired(session, at)) {
          sessions.delete(id);
          removed++;
        }
      }
      return removed;
    },

    async size() {
      return sessions.size;
    },

    clear() {
      sessions.clear();
    },
  };
}
