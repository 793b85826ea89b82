import { DEFAULT_WORKER_MAX_MESSAGES } from '../config/index.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../log.js';
import type { MessagingHub } from '../hub/index.js';
import type { Recommender } from '../recommend/index.js';
import type { IProfileStore } from '../store/index.js';
import type { HubMessage, Profile, WorkerOutcome } from '../types.js';
import {
  RECOMMENDATION_ERROR,
  RECOMMENDATION_REQUEST,
  RECOMMENDATION_RESPONSE,
  payloadType,
  stringField,
  type RecommendationErrorPayload,
  type RecommendationResponsePayload,
} from './protocol.js';

const log = createLogger('worker');

export interface WorkerDeps {
  hub: MessagingHub;
  store: IProfileStore;
  recommender: Recommender;
}

/**
 * Answers the recommendation requests waiting in one agent's mailbox.
 *
 * A pass drains the whole mailbox and looks at no more than `maxMessages`
 * of what it took; the rest is dropped. Each request examined produces at
 * most one reply to its sender.
 */
export class RecommendationWorker {
  constructor(private readonly deps: WorkerDeps) {}

  async process(agentId: string, maxMessages = DEFAULT_WORKER_MAX_MESSAGES): Promise<WorkerOutcome[]> {
    const drained = this.deps.hub.receive(agentId, true);
    const batch = drained.slice(0, Math.max(0, maxMessages));
    if (drained.length > batch.length) {
      log.warn(`${agentId}: dropped ${drained.length - batch.length} message(s) over the cap of ${maxMessages}`);
    }

    const outcomes: WorkerOutcome[] = [];
    for (const message of batch) {
      outcomes.push(await this.handle(agentId, message));
    }
    return outcomes;
  }

  private async handle(agentId: string, message: HubMessage): Promise<WorkerOutcome> {
    const type = payloadType(message.payload);
    if (type !== RECOMMENDATION_REQUEST) {
      return {
        requestMessageId: message.id,
        status: 'ignored',
        reason: `Unsupported payload.type '${String(type)}'`,
      };
    }

    const query = stringField(message.payload, 'query') ?? '';
    const profileUserId = stringField(message.payload, 'from_user_id') ?? message.from;

    const profile = await this.loadProfile(profileUserId);
    if (!profile) {
      const reason = `No profile found for user_id '${profileUserId}'`;
      const reply: RecommendationErrorPayload = {
        type: RECOMMENDATION_ERROR,
        reason,
        original_message_id: message.id,
      };
      this.deps.hub.send(agentId, message.from, reply);
      return { requestMessageId: message.id, status: 'error', error: reason };
    }

    const result = await this.deps.recommender.generate(profile, query);
    const reply: RecommendationResponsePayload = {
      type: RECOMMENDATION_RESPONSE,
      original_message_id: message.id,
      query,
      profile_user_id: profileUserId,
      result,
    };
    this.deps.hub.send(agentId, message.from, reply);
    return { requestMessageId: message.id, status: 'ok', sentTo: message.from };
  }

  // A failing lookup is answered like a missing profile.
  private async loadProfile(userId: string): Promise<Profile | null> {
    try {
      return await this.deps.store.loadProfile(userId);
    } catch (err) {
      log.error(`profile lookup for '${userId}' failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
