import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';

const agentId = z.string().min(1).max(128);

export const experienceBodySchema = z.object({
  name: z.string().min(1).max(256),
  notes: z.string().max(4096),
  rating: z.number().int().min(1).max(5),
});

export const profileBodySchema = z.object({
  name: z.string().min(1).max(128),
  personality: z.string().max(4096),
  values: z.string().max(4096),
  experiences: z.array(experienceBodySchema).max(100).default([]),
});

export const searchSchema = z.object({
  query: z.string().min(1).max(2000),
});

export const registerAgentSchema = z.object({
  agentId,
  agentType: z.string().min(1).max(64).default('freigent'),
  displayName: z.string().min(1).max(128),
  personalitySummary: z.string().max(4096).default(''),
});

export const sendMessageSchema = z.object({
  from: agentId,
  to: agentId,
  payload: z.record(z.unknown()),
});

export const processInboxSchema = z.object({
  maxMessages: z.number().int().min(1).max(1000).optional(),
});

export function validate(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
      return;
    }
    req.body = result.data;
    next();
  };
}

/** Parses a validated body again to get its typed value. */
export function bodyOf<T extends z.ZodTypeAny>(schema: T, req: Request): z.output<T> {
  return schema.parse(req.body);
}
