import type { Profile } from '../types.js';

export const SYSTEM_PROMPT = [
  'You are the product recommendation engine behind Freigent, an AI shopping friend. You receive:',
  '1) A detailed user profile (personality, values, previous products).',
  '2) A free-text product search query.',
  '',
  'Suggest 3-5 concrete product ideas that fit this user.',
  'IMPORTANT:',
  '- Respond with ONLY valid JSON.',
  '- No markdown, no backticks, no text outside the JSON.',
  '- Use exactly this structure:',
  '{',
  '  "products": [',
  '    {',
  '      "name": "string",',
  '      "short_description": "string",',
  '      "why_match": "string",',
  '      "estimated_price_range": "string"',
  '    },',
  '    ... 3 to 5 items ...',
  '  ],',
  '  "summary_for_user": "short, friendly paragraph explaining the recommendations"',
  '}',
  '- The JSON must parse with a standard JSON parser.',
].join('\n');

const RULE = '----------------------------------------';

export function profileToText(profile: Profile): string {
  const lines = profile.experiences.map((e) => `- ${e.name} (rating ${e.rating}/5): ${e.notes}`);
  const experienceText = lines.length > 0 ? lines.join('\n') : 'No concrete past product experience.';

  return (
    `User name: ${profile.name || 'Unknown user'}\n` +
    `Personality: ${profile.personality}\n` +
    `Values in products: ${profile.values}\n` +
    `Past product experience:\n${experienceText}\n`
  );
}

export function buildUserPrompt(profile: Profile, query: string): string {
  return (
    'Here is the user profile:\n' +
    `${RULE}\n` +
    `${profileToText(profile)}\n` +
    `${RULE}\n\n` +
    "Here is the user's product search query:\n" +
    `${query}\n\n` +
    'Now generate the JSON response as specified. Remember: JSON only.'
  );
}
