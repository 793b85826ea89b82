import type { Recommender } from './recommend/index.js';
import type { Product, Profile, RecommendationResult } from './types.js';

export function makeProfile(name: string, overrides: Partial<Profile> = {}): Profile {
  return { name, personality: `${name} personality`, values: `${name} values`, experiences: [], ...overrides };
}

/** The product FakeRecommender returns on its `call`-th call (1-based). */
export function productFor(profile: Profile, query: string, call = 1): Product {
  return {
    name: `${profile.name}: ${query} #${call}`,
    short_description: 'test product',
    why_match: `fits ${profile.name}`,
    estimated_price_range: '$10-$20',
  };
}

/** Recommender stand-in: one product per call, named after the profile and query. */
export class FakeRecommender implements Recommender {
  readonly calls: Array<{ profile: Profile; query: string }> = [];
  readonly failFor = new Set<string>();

  async generate(profile: Profile, query: string): Promise<RecommendationResult> {
    this.calls.push({ profile, query });
    if (this.failFor.has(profile.name)) throw new Error(`generation failed for ${profile.name}`);
    return { products: [productFor(profile, query, this.calls.length)], summary_for_user: `Summary for ${profile.name}` };
  }
}
