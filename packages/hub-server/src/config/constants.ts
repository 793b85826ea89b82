export class Sections {
  static readonly SERVER = 'server';
  static readonly RATE_LIMIT = 'rate_limit';
  static readonly HUB = 'hub';
  static readonly STORE = 'store';
  static readonly LLM = 'llm';
  static readonly LOG = 'log';
}

export class Keys {
  // server
  static readonly HOST = 'host';
  static readonly PORT = 'port';
  static readonly CORS_ORIGINS = 'cors_origins';
  // rate_limit
  static readonly WINDOW_MS = 'window_ms';
  static readonly MAX_REQUESTS = 'max_requests';
  // hub
  static readonly AGENT_TYPE = 'agent_type';
  static readonly WORKER_MAX_MESSAGES = 'worker_max_messages';
  // store
  static readonly DRIVER = 'driver';
  static readonly VOLUME_PATH = 'volume_path';
  static readonly REDIS_URL = 'redis_url';
  // llm
  static readonly API_KEY = 'api_key';
  static readonly MODEL = 'model';
  static readonly MAX_TOKENS = 'max_tokens';
  // log
  static readonly LEVEL = 'level';
}

export const DEFAULT_AGENT_TYPE = 'freigent';
export const DEFAULT_WORKER_MAX_MESSAGES = 10;
export const DEFAULT_MODEL = 'claude-3-haiku-20240307';
export const DEFAULT_MAX_TOKENS = 2048;
