import { productSchema } from '../schemas.js';
import type { Product, RecommendationResult } from '../types.js';

export const MISSING_SUMMARY = 'No summary_for_user provided by the model.';

export function fallbackResult(reason: string): RecommendationResult {
  return {
    products: [],
    summary_for_user:
      'The agent tried to return a result, but there was an error parsing the JSON output.\n\nError: ' + reason,
  };
}

/** Keeps every object entry of `value` as a product; anything else yields []. */
export function toProducts(value: unknown): Product[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((item) => {
    const parsed = productSchema.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeResult(value: unknown, missingSummary = ''): RecommendationResult {
  if (!isRecord(value)) return { products: [], summary_for_user: missingSummary };
  const summary = value['summary_for_user'];
  return {
    products: toProducts(value['products']),
    summary_for_user: typeof summary === 'string' ? summary : missingSummary,
  };
}

/**
 * Reads the model's reply as a recommendation document. Throws when the text
 * is not a JSON object; missing keys are filled in.
 */
export function parseRecommendation(raw: string): RecommendationResult {
  const text = raw.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed)) throw new Error('Model output is not a JSON object');
  return normalizeResult(parsed, MISSING_SUMMARY);
}
