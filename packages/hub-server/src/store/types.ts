import type { AgentRecord, Profile } from '../types.js';

export interface IProfileStore {
  // Profiles
  loadProfile(userId: string): Promise<Profile | null>;
  /** Replaces the stored profile, experiences included. */
  upsertProfile(userId: string, profile: Profile): Promise<void>;
  listProfileIds(): Promise<string[]>;

  // Agents
  upsertAgent(agent: AgentRecord): Promise<void>;
  getAgent(agentId: string): Promise<AgentRecord | null>;
  /**
   * Agents of `agentType`, other than `baseId`, that have a stored profile.
   * Ordered by when each agent was first stored.
   */
  listPeerIds(baseId: string, agentType: string): Promise<string[]>;

  close(): Promise<void>;
}
