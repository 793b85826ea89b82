import type { AgentRecord } from '../types.js';

/**
 * Process-local directory of named agents.
 *
 * Registration is an upsert: the latest call wins on every field, and the
 * agent keeps the position it was first seen at when listed.
 */
export class AgentDirectory {
  private readonly agents = new Map<string, AgentRecord>();

  register(
    agentId: string,
    agentType: string,
    displayName: string,
    personalitySummary = '',
  ): AgentRecord {
    const record: AgentRecord = { agentId, agentType, displayName, personalitySummary };
    // Map.set on an existing key keeps the original insertion slot
    this.agents.set(agentId, record);
    return { ...record };
  }

  get(agentId: string): AgentRecord | undefined {
    const record = this.agents.get(agentId);
    return record ? { ...record } : undefined;
  }

  has(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  list(): AgentRecord[] {
    return [...this.agents.values()].map((a) => ({ ...a }));
  }

  get size(): number {
    return this.agents.size;
  }
}
