import { ConfigLoader, Sections, Keys, DEFAULT_AGENT_TYPE, DEFAULT_MAX_TOKENS, DEFAULT_MODEL, DEFAULT_WORKER_MAX_MESSAGES } from './config/index.js';
import { MessagingHub } from './hub/index.js';
import { Orchestrator } from './orchestrator/index.js';
import { LlmRecommender, anthropicTextGenerator } from './recommend/index.js';
import { FreigentService } from './services/freigent.js';
import { createStore } from './store/index.js';
import { RecommendationWorker } from './worker/index.js';
import type { Recommender } from './recommend/index.js';
import type { IProfileStore } from './store/index.js';

/** Everything a request handler needs; built once per process (or per test). */
export interface AppContext {
  hub: MessagingHub;
  store: IProfileStore;
  recommender: Recommender;
  worker: RecommendationWorker;
  orchestrator: Orchestrator;
  freigent: FreigentService;
  workerMaxMessages: number;
}

export interface ContextOptions {
  store: IProfileStore;
  recommender: Recommender;
  hub?: MessagingHub;
  agentType?: string;
  workerMaxMessages?: number;
}

export function createContext(opts: ContextOptions): AppContext {
  const hub = opts.hub ?? new MessagingHub();
  const { store, recommender } = opts;
  const agentType = opts.agentType ?? DEFAULT_AGENT_TYPE;
  const workerMaxMessages = opts.workerMaxMessages ?? DEFAULT_WORKER_MAX_MESSAGES;

  const worker = new RecommendationWorker({ hub, store, recommender });
  const orchestrator = new Orchestrator({ hub, store, recommender, worker }, { agentType, workerMaxMessages });
  const freigent = new FreigentService({ hub, store, recommender, orchestrator, agentType });

  return { hub, store, recommender, worker, orchestrator, freigent, workerMaxMessages };
}

export async function createContextFromConfig(config: ConfigLoader): Promise<AppContext> {
  const recommender = new LlmRecommender(
    anthropicTextGenerator({
      apiKey: config.get(Sections.LLM, Keys.API_KEY, ''),
      model: config.get(Sections.LLM, Keys.MODEL, DEFAULT_MODEL),
      maxTokens: config.get(Sections.LLM, Keys.MAX_TOKENS, DEFAULT_MAX_TOKENS),
    }),
  );

  const store = await createStore({
    driver: config.get(Sections.STORE, Keys.DRIVER, 'memory'),
    volumePath: config.get(Sections.STORE, Keys.VOLUME_PATH, ''),
    redisUrl: config.get(Sections.STORE, Keys.REDIS_URL, ''),
  });

  return createContext({
    store,
    recommender,
    agentType: config.get(Sections.HUB, Keys.AGENT_TYPE, DEFAULT_AGENT_TYPE),
    workerMaxMessages: config.get(Sections.HUB, Keys.WORKER_MAX_MESSAGES, DEFAULT_WORKER_MAX_MESSAGES),
  });
}
