import type { CampaignTable, Timestamp } from '@campaign-demand/protocol';

/**
 * Session identifier (UUID string)
 */
export type SessionId = string;

/**
 * One user's loaded campaign table, held for the length of a session.
 */
export type CampaignSession = {
  id: SessionId;
  table: CampaignTable;
  createdAt: Timestamp;
  expiresAt: Timestamp;
};

/**
 * Repository interface for campaign sessions.
 *
 * Sessions are transient: they live in the serving process only and are
 * gone once they expire, are deleted, or the process stops.
 */
export interface SessionRepository {
  /**
   * Store a freshly loaded table under a new session
   */
  create(table: CampaignTable): Promise<CampaignSession>;

  /**
   * Get a live session by ID
   * @returns Session or null if unknown or expired
   */
  get(id: SessionId): Promise<CampaignSession | null>;

  /**
   * Delete a session
   * @returns true if a session was removed
   */
  delete(id: SessionId): Promise<boolean>;

  /**
   * Remove every session that has expired by `now`
   * @returns Number of sessions removed
   */
  purgeExpired(now?: Date): Promise<number>;

  /**
   * Number of sessions currently held, expired ones included until purged
   */
  size(): Promise<number>;
}
