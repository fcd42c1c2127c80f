// Repository interfaces

export type {
  SessionId,
  CampaignSession,
  SessionRepository,
} from './session-repository.js';
