import { Redis } from 'ioredis';
import { agentRecordSchema, profileSchema } from '../schemas.js';
import type { AgentRecord, Profile } from '../types.js';
import type { IProfileStore } from './types.js';

export class RedisProfileStore implements IProfileStore {
  readonly client: Redis;

  /** Takes a URL (connected later by `connect()`) or a client that is already set up. */
  constructor(target: string | Redis = process.env['REDIS_URL'] ?? 'redis://localhost:6379') {
    this.client = typeof target === 'string' ? new Redis(target, { lazyConnect: true }) : target;
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  // ─── Key helpers ──────────────────────────────────────────────────────────

  private k = {
    profile:    (id: string) => `profile:${id}`,
    profiles:   ()           => 'profiles',
    agent:      (id: string) => `agent:${id}`,
    agentSet:   ()           => 'agents',
    agentOrder: ()           => 'agents:order',
  };

  // ─── Profiles ─────────────────────────────────────────────────────────────

  async loadProfile(userId: string): Promise<Profile | null> {
    const raw = await this.client.get(this.k.profile(userId));
    return raw ? profileSchema.parse(JSON.parse(raw)) : null;
  }

  async upsertProfile(userId: string, profile: Profile): Promise<void> {
    const pipe = this.client.pipeline();
    // Experiences live inside the profile document, so a SET replaces them all
    pipe.set(this.k.profile(userId), JSON.stringify(profile));
    pipe.sadd(this.k.profiles(), userId);
    await pipe.exec();
  }

  async listProfileIds(): Promise<string[]> {
    return this.client.smembers(this.k.profiles());
  }

  // ─── Agents ───────────────────────────────────────────────────────────────

  async upsertAgent(agent: AgentRecord): Promise<void> {
    await this.client.set(this.k.agent(agent.agentId), JSON.stringify(agent));
    const added = await this.client.sadd(this.k.agentSet(), agent.agentId);
    if (added === 1) await this.client.rpush(this.k.agentOrder(), agent.agentId);
  }

  async getAgent(agentId: string): Promise<AgentRecord | null> {
    const raw = await this.client.get(this.k.agent(agentId));
    return raw ? agentRecordSchema.parse(JSON.parse(raw)) : null;
  }

  async listPeerIds(baseId: string, agentType: string): Promise<string[]> {
    const ids = (await this.client.lrange(this.k.agentOrder(), 0, -1)).filter((id) => id !== baseId);
    if (ids.length === 0) return [];

    const pipe = this.client.pipeline();
    for (const id of ids) {
      pipe.get(this.k.agent(id));
      pipe.exists(this.k.profile(id));
    }
    const results = (await pipe.exec()) ?? [];

    const peers: string[] = [];
    ids.forEach((id, i) => {
      const metaRaw = results[i * 2]?.[1];
      const hasProfile = results[i * 2 + 1]?.[1];
      if (typeof metaRaw !== 'string' || hasProfile !== 1) return; // stale list entry
      const agent = agentRecordSchema.parse(JSON.parse(metaRaw));
      if (agent.agentType === agentType) peers.push(id);
    });
    return peers;
  }
}
