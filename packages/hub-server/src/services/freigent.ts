import { DEFAULT_AGENT_TYPE } from '../config/index.js';
import { ProfileNotFoundError } from '../errors.js';
import type { MessagingHub } from '../hub/index.js';
import type { Orchestrator } from '../orchestrator/index.js';
import type { Recommender } from '../recommend/index.js';
import type { IProfileStore } from '../store/index.js';
import type { AgentRecord, AutoSearchResult, Profile, RecommendationResult } from '../types.js';

export interface FreigentServiceDeps {
  hub: MessagingHub;
  store: IProfileStore;
  recommender: Recommender;
  orchestrator: Orchestrator;
  agentType?: string;
}

/** What the HTTP and MCP surfaces call for profile-backed searches. */
export class FreigentService {
  private readonly agentType: string;

  constructor(private readonly deps: FreigentServiceDeps) {
    this.agentType = deps.agentType ?? DEFAULT_AGENT_TYPE;
  }

  /** Stores the profile and makes its owner a discoverable agent. */
  async saveProfile(userId: string, profile: Profile): Promise<AgentRecord> {
    await this.deps.store.upsertProfile(userId, profile);
    const record: AgentRecord = {
      agentId: userId,
      agentType: this.agentType,
      displayName: profile.name,
      personalitySummary: profile.personality,
    };
    await this.deps.store.upsertAgent(record);
    return this.deps.hub.register(record);
  }

  getProfile(userId: string): Promise<Profile | null> {
    return this.deps.store.loadProfile(userId);
  }

  async search(userId: string, query: string): Promise<RecommendationResult> {
    const profile = await this.deps.store.loadProfile(userId);
    if (!profile) throw new ProfileNotFoundError(userId);
    return this.deps.recommender.generate(profile, query);
  }

  autoSearch(userId: string, query: string): Promise<AutoSearchResult> {
    return this.deps.orchestrator.run(userId, query);
  }
}
