export { ConfigLoader, configEnvFromNodeEnv } from './loader.js';
export {
  Sections,
  Keys,
  DEFAULT_AGENT_TYPE,
  DEFAULT_WORKER_MAX_MESSAGES,
  DEFAULT_MODEL,
  DEFAULT_MAX_TOKENS,
} from './constants.js';
