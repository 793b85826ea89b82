import { DEFAULT_AGENT_TYPE, DEFAULT_WORKER_MAX_MESSAGES } from '../config/index.js';
import { ProfileNotFoundError, errorMessage } from '../errors.js';
import { createLogger } from '../log.js';
import { fallbackResult, normalizeResult } from '../recommend/index.js';
import { RECOMMENDATION_RESPONSE, payloadType, requestPayload } from '../worker/index.js';
import type { MessagingHub } from '../hub/index.js';
import type { Recommender } from '../recommend/index.js';
import type { IProfileStore } from '../store/index.js';
import type { RecommendationWorker } from '../worker/index.js';
import type {
  AutoSearchResult,
  HelperResult,
  HubMessage,
  Product,
  Profile,
  RecommendationResult,
} from '../types.js';

const log = createLogger('orchestrator');

const noop = (): void => {};

export interface OrchestratorDeps {
  hub: MessagingHub;
  store: IProfileStore;
  recommender: Recommender;
  worker: RecommendationWorker;
}

export interface OrchestratorOptions {
  agentType?: string;
  workerMaxMessages?: number;
}

export function mergedSummary(baseId: string, helperCount: number, helperIds: string[]): string {
  return (
    `This response combines the base Freigent '${baseId}' recommendations ` +
    `with ${helperCount} helper Freigent(s): ${helperIds.length > 0 ? helperIds.join(', ') : 'none'}.`
  );
}

/**
 * Runs one multi-agent search: the base agent answers first, then every peer
 * is asked through the hub and answered by its worker, one peer at a time.
 *
 * Peers are handled in discovery order and their products are appended in
 * the order their replies reach the base mailbox, which for a sequential run
 * is the same order. Only a missing base profile fails the run.
 */
export class Orchestrator {
  private readonly agentType: string;
  private readonly workerMaxMessages: number;
  // Runs for one base id share its mailbox, so they are chained.
  private readonly running = new Map<string, Promise<void>>();

  constructor(private readonly deps: OrchestratorDeps, opts: OrchestratorOptions = {}) {
    this.agentType = opts.agentType ?? DEFAULT_AGENT_TYPE;
    this.workerMaxMessages = opts.workerMaxMessages ?? DEFAULT_WORKER_MAX_MESSAGES;
  }

  run(baseId: string, query: string): Promise<AutoSearchResult> {
    const previous = this.running.get(baseId) ?? Promise.resolve();
    const current = previous.then(() => this.execute(baseId, query));
    const settled = current.then(noop, noop);
    this.running.set(baseId, settled);
    return current.finally(() => {
      if (this.running.get(baseId) === settled) this.running.delete(baseId);
    });
  }

  private async execute(baseId: string, query: string): Promise<AutoSearchResult> {
    const { hub, store, worker } = this.deps;

    const profile = await store.loadProfile(baseId);
    if (!profile) throw new ProfileNotFoundError(baseId);

    const baseResult = await this.generateSafely(profile, query);

    const helperIds = await this.discoverPeers(baseId);
    const peers = await this.registerPeers(helperIds);

    for (const peerId of peers) {
      hub.send(baseId, peerId, requestPayload(baseId, query));
    }

    for (const peerId of peers) {
      try {
        await worker.process(peerId, this.workerMaxMessages);
      } catch (err) {
        log.error(`worker pass for '${peerId}' failed: ${errorMessage(err)}`);
      }
    }

    const helperResults = collectResponses(hub.receive(baseId, true));

    const mergedProducts: Product[] = [
      ...baseResult.products,
      ...helperResults.flatMap((h) => h.result.products),
    ];

    log.info(`run for '${baseId}': ${helperResults.length}/${helperIds.length} peer(s) answered`);

    return {
      baseAgentId: baseId,
      helperAgentIds: helperIds,
      baseResult,
      helperResults,
      mergedProducts,
      mergedSummaryForUser: mergedSummary(baseId, helperResults.length, helperIds),
    };
  }

  private async generateSafely(profile: Profile, query: string): Promise<RecommendationResult> {
    try {
      return await this.deps.recommender.generate(profile, query);
    } catch (err) {
      log.error(`base recommendation for '${profile.name}' failed: ${errorMessage(err)}`);
      return fallbackResult(errorMessage(err));
    }
  }

  private async discoverPeers(baseId: string): Promise<string[]> {
    try {
      return await this.deps.store.listPeerIds(baseId, this.agentType);
    } catch (err) {
      log.error(`peer discovery for '${baseId}' failed: ${errorMessage(err)}`);
      return [];
    }
  }

  // A peer whose profile is gone (or unreadable) by now stays listed but is
  // neither registered nor asked.
  private async registerPeers(peerIds: string[]): Promise<string[]> {
    const reachable: string[] = [];
    for (const peerId of peerIds) {
      try {
        const peer = await this.deps.store.loadProfile(peerId);
        if (!peer) {
          log.warn(`peer '${peerId}' has no profile any more, skipping`);
          continue;
        }
        this.deps.hub.register({
          agentId: peerId,
          agentType: this.agentType,
          displayName: peer.name,
          personalitySummary: peer.personality,
        });
        reachable.push(peerId);
      } catch (err) {
        log.warn(`could not register peer '${peerId}': ${errorMessage(err)}`);
      }
    }
    return reachable;
  }
}

function collectResponses(messages: HubMessage[]): HelperResult[] {
  return messages
    .filter((m) => payloadType(m.payload) === RECOMMENDATION_RESPONSE)
    .map((m) => ({ agentId: m.from, result: normalizeResult(m.payload['result']) }));
}
