import express from 'express';
import cors from 'cors';
import type { AppContext } from './context.js';
import type { SseSessions } from './mcp/server.js';
import { errorHandler, notFound } from './middleware/errors.js';
import { createFreigentRouter } from './routes/freigent.js';
import { createHealthRouter } from './routes/health.js';
import { createHubRouter } from './routes/hub.js';
import { createMessagesRouter } from './routes/messages.js';
import { createSseRouter } from './routes/sse.js';

export interface AppOptions {
  corsOrigins?: string;
  limiter?: express.RequestHandler;
}

export function createApp(ctx: AppContext, opts: AppOptions = {}): express.Express {
  const corsOrigins = opts.corsOrigins ?? '*';
  const sessions: SseSessions = new Map();

  const app = express();

  app.use(cors({ origin: corsOrigins === '*' ? '*' : corsOrigins.split(',').map((o) => o.trim()) }));
  app.use(express.json({ limit: '1mb' }));
  if (opts.limiter) app.use(opts.limiter);

  app.use('/health', createHealthRouter(ctx));
  app.use('/freigent', createFreigentRouter(ctx));
  app.use('/hub', createHubRouter(ctx));
  app.use('/sse', createSseRouter(ctx, sessions));
  app.use('/messages', createMessagesRouter(sessions));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}

export { createContext, createContextFromConfig } from './context.js';
export type { AppContext, ContextOptions } from './context.js';
export * from './types.js';
