export type MessagePayload = Record<string, unknown>;

export interface HubMessage {
  id: string;
  from: string;
  to: string;
  payload: MessagePayload;
  timestamp: number;
}

export interface AgentRecord {
  agentId: string;
  agentType: string;
  displayName: string;
  personalitySummary: string;
}

export interface Experience {
  name: string;
  notes: string;
  rating: number;
}

export interface Profile {
  name: string;
  personality: string;
  values: string;
  experiences: Experience[];
}

export interface Product {
  name: string;
  short_description: string;
  why_match: string;
  estimated_price_range: string;
  [key: string]: unknown;
}

export interface RecommendationResult {
  products: Product[];
  summary_for_user: string;
}

export interface HelperResult {
  agentId: string;
  result: RecommendationResult;
}

export interface AutoSearchResult {
  baseAgentId: string;
  helperAgentIds: string[];
  baseResult: RecommendationResult;
  helperResults: HelperResult[];
  mergedProducts: Product[];
  mergedSummaryForUser: string;
}

export type WorkerStatus = 'ok' | 'ignored' | 'error';

export interface WorkerOutcome {
  requestMessageId: string;
  status: WorkerStatus;
  sentTo?: string;
  reason?: string;
  error?: string;
}
