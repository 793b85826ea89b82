import { z } from 'zod';

export const experienceSchema = z.object({
  name: z.string(),
  notes: z.string(),
  rating: z.number().int(),
});

export const profileSchema = z.object({
  name: z.string(),
  personality: z.string(),
  values: z.string(),
  experiences: z.array(experienceSchema).default([]),
});

export const agentRecordSchema = z.object({
  agentId: z.string(),
  agentType: z.string(),
  displayName: z.string(),
  personalitySummary: z.string().default(''),
});

// Model output is loosely shaped: absent or null product fields read as empty
// strings, other scalars are stringified, unknown keys are kept.
function productText(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

const productField = z.preprocess(productText, z.string());

export const productSchema = z
  .object({
    name: productField,
    short_description: productField,
    why_match: productField,
    estimated_price_range: productField,
  })
  .passthrough();
