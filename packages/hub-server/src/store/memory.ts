import type { AgentRecord, Profile } from '../types.js';
import type { IProfileStore } from './types.js';

export class MemoryProfileStore implements IProfileStore {
  private profiles = new Map<string, Profile>();
  private agents = new Map<string, AgentRecord>();

  async loadProfile(userId: string): Promise<Profile | null> {
    const profile = this.profiles.get(userId);
    return profile ? structuredClone(profile) : null;
  }

  async upsertProfile(userId: string, profile: Profile): Promise<void> {
    this.profiles.set(userId, structuredClone(profile));
  }

  async listProfileIds(): Promise<string[]> {
    return [...this.profiles.keys()];
  }

  async upsertAgent(agent: AgentRecord): Promise<void> {
    this.agents.set(agent.agentId, { ...agent });
  }

  async getAgent(agentId: string): Promise<AgentRecord | null> {
    const agent = this.agents.get(agentId);
    return agent ? { ...agent } : null;
  }

  async listPeerIds(baseId: string, agentType: string): Promise<string[]> {
    return [...this.agents.values()]
      .filter((a) => a.agentType === agentType && a.agentId !== baseId && this.profiles.has(a.agentId))
      .map((a) => a.agentId);
  }

  async close(): Promise<void> {}
}
