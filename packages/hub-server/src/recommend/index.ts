export { LlmRecommender } from './recommender.js';
export type { Recommender, TextGenerator, TextRequest } from './recommender.js';
export { anthropicTextGenerator } from './anthropic.js';
export type { AnthropicOptions } from './anthropic.js';
export { fallbackResult, normalizeResult, parseRecommendation, toProducts, MISSING_SUMMARY } from './result.js';
export { buildUserPrompt, profileToText, SYSTEM_PROMPT } from './prompt.js';
