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

export interface AutoSearchResult {
  baseAgentId: string;
  helperAgentIds: string[];
  baseResult: RecommendationResult;
  helperResults: Array<{ agentId: string; result: RecommendationResult }>;
  mergedProducts: Product[];
  mergedSummaryForUser: string;
}

export interface AgentRecord {
  agentId: string;
  agentType: string;
  displayName: string;
  personalitySummary: string;
}

export interface AgentInfo extends AgentRecord {
  pendingMessages: number;
}

export interface HubMessage {
  id: string;
  from: string;
  to: string;
  payload: Record<string, unknown>;
  timestamp: number;
}

export interface WorkerOutcome {
  requestMessageId: string;
  status: 'ok' | 'ignored' | 'error';
  sentTo?: string;
  reason?: string;
  error?: string;
}

export interface HealthStatus {
  status: string;
  uptime: number;
  agents: number;
  profiles: number;
}
