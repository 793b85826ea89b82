import Anthropic from '@anthropic-ai/sdk';
import { ConfigError } from '../errors.js';
import type { TextGenerator } from './recommender.js';

export interface AnthropicOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
}

export function anthropicTextGenerator(opts: AnthropicOptions): TextGenerator {
  if (!opts.apiKey) {
    throw new ConfigError('ANTHROPIC_API_KEY is not set ([llm] api_key)');
  }

  const client = new Anthropic({ apiKey: opts.apiKey });

  return async ({ system, prompt }) => {
    const response = await client.messages.create({
      model: opts.model,
      max_tokens: opts.maxTokens,
      system,
      messages: [{ role: 'user', content: prompt }],
    });

    const block = response.content.find((b): b is Anthropic.TextBlock => b.type === 'text');
    return block ? block.text.trim() : '';
  };
}
