import { buildUserPrompt, SYSTEM_PROMPT } from './prompt.js';
import { fallbackResult, parseRecommendation } from './result.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../log.js';
import type { Profile, RecommendationResult } from '../types.js';

const log = createLogger('recommender');

export interface Recommender {
  /** Never rejects: failures come back as an empty fallback result. */
  generate(profile: Profile, query: string): Promise<RecommendationResult>;
}

export interface TextRequest {
  system: string;
  prompt: string;
}

export type TextGenerator = (request: TextRequest) => Promise<string>;

export class LlmRecommender implements Recommender {
  constructor(private readonly generateText: TextGenerator) {}

  async generate(profile: Profile, query: string): Promise<RecommendationResult> {
    try {
      const raw = await this.generateText({ system: SYSTEM_PROMPT, prompt: buildUserPrompt(profile, query) });
      return parseRecommendation(raw);
    } catch (err) {
      log.warn(`generation failed for '${profile.name}': ${errorMessage(err)}`);
      return fallbackResult(errorMessage(err));
    }
  }
}
