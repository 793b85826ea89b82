import { fetch } from 'undici';
import type {
  AgentInfo,
  AgentRecord,
  AutoSearchResult,
  HealthStatus,
  HubMessage,
  Profile,
  RecommendationResult,
  WorkerOutcome,
} from './types.js';

export interface FreigentClientOptions {
  baseUrl: string;
}

export class FreigentClientError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'FreigentClientError';
    this.status = status;
  }
}

export class FreigentClient {
  private readonly baseUrl: string;

  constructor(opts: FreigentClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
  }

  health(): Promise<HealthStatus> {
    return this.request('GET', '/health');
  }

  saveProfile(userId: string, profile: Profile): Promise<{ status: string; userId: string }> {
    return this.request('POST', `/freigent/${encodeURIComponent(userId)}/profile`, profile);
  }

  getProfile(userId: string): Promise<Profile> {
    return this.request('GET', `/freigent/${encodeURIComponent(userId)}/profile`);
  }

  search(userId: string, query: string): Promise<RecommendationResult> {
    return this.request('POST', `/freigent/${encodeURIComponent(userId)}/search`, { query });
  }

  autoSearch(userId: string, query: string): Promise<AutoSearchResult> {
    return this.request('POST', `/freigent/${encodeURIComponent(userId)}/auto_search`, { query });
  }

  registerAgent(agent: Omit<AgentRecord, 'agentType' | 'personalitySummary'> & Partial<AgentRecord>): Promise<AgentRecord> {
    return this.request('POST', '/hub/agents', agent);
  }

  listAgents(): Promise<AgentInfo[]> {
    return this.request('GET', '/hub/agents');
  }

  send(from: string, to: string, payload: Record<string, unknown>): Promise<HubMessage> {
    return this.request('POST', '/hub/messages', { from, to, payload });
  }

  /** Reads an agent's mailbox; drains it unless `clear` is false. */
  inbox(agentId: string, clear = true): Promise<HubMessage[]> {
    const suffix = clear ? '' : '?clear=false';
    return this.request('GET', `/hub/inbox/${encodeURIComponent(agentId)}${suffix}`);
  }

  process(agentId: string, maxMessages?: number): Promise<WorkerOutcome[]> {
    return this.request('POST', `/hub/agents/${encodeURIComponent(agentId)}/process`, maxMessages === undefined ? {} : { maxMessages });
  }

  // Response bodies are trusted to match the server's types.
  private async request<T>(method: 'GET' | 'POST', path: string, body?: unknown): Promise<T> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new FreigentClientError(res.status, `${method} ${path} failed: ${errorText(text, res.statusText)}`);
    }

    return res.json() as Promise<T>;
  }
}

function errorText(text: string, fallback: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
      return parsed.error;
    }
  } catch {
    // not JSON; use the raw text below
  }
  return text || fallback;
}
