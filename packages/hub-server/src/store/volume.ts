import { readFileSync, writeFileSync, mkdirSync, renameSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { agentRecordSchema, profileSchema } from '../schemas.js';
import type { AgentRecord, Profile } from '../types.js';
import type { IProfileStore } from './types.js';

// Agents are kept as an array: object keys that look like integers would
// lose their insertion order once round-tripped through JSON.
const fileStateSchema = z.object({
  agents: z.array(agentRecordSchema).default([]),
  profiles: z.record(profileSchema).default({}),
});

type FileState = z.infer<typeof fileStateSchema>;

export class VolumeProfileStore implements IProfileStore {
  private readonly path: string;

  constructor(path: string = process.env['FREIGENT_DATA_PATH'] ?? '/data/freigent.json') {
    this.path = path;
  }

  // ─── Persistence helpers ──────────────────────────────────────────────────

  private load(): FileState {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8');
    } catch {
      return { agents: [], profiles: {} };
    }
    return fileStateSchema.parse(JSON.parse(raw));
  }

  private save(state: FileState): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, JSON.stringify(state));
    renameSync(tmp, this.path); // atomic on POSIX
  }

  // ─── Profiles ─────────────────────────────────────────────────────────────

  async loadProfile(userId: string): Promise<Profile | null> {
    const { profiles } = this.load();
    return Object.hasOwn(profiles, userId) ? profiles[userId] : null;
  }

  async upsertProfile(userId: string, profile: Profile): Promise<void> {
    const state = this.load();
    state.profiles[userId] = profile;
    this.save(state);
  }

  async listProfileIds(): Promise<string[]> {
    return Object.keys(this.load().profiles);
  }

  // ─── Agents ───────────────────────────────────────────────────────────────

  async upsertAgent(agent: AgentRecord): Promise<void> {
    const state = this.load();
    const idx = state.agents.findIndex((a) => a.agentId === agent.agentId);
    if (idx >= 0) state.agents[idx] = agent;
    else state.agents.push(agent);
    this.save(state);
  }

  async getAgent(agentId: string): Promise<AgentRecord | null> {
    return this.load().agents.find((a) => a.agentId === agentId) ?? null;
  }

  async listPeerIds(baseId: string, agentType: string): Promise<string[]> {
    const { agents, profiles } = this.load();
    return agents
      .filter((a) => a.agentType === agentType && a.agentId !== baseId && Object.hasOwn(profiles, a.agentId))
      .map((a) => a.agentId);
  }

  async close(): Promise<void> {}
}
