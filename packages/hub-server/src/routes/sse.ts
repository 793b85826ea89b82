import { Router } from 'express';
import type { AppContext } from '../context.js';
import { createFreigentMcpServer, type SseSessions } from '../mcp/server.js';

// GET /sse: MCP over SSE; the transport writes its own event-stream headers
export function createSseRouter(ctx: AppContext, sessions: SseSessions): Router {
  const router = Router();

  router.get('/', (_req, res, next) => {
    createFreigentMcpServer(ctx, res, sessions).catch(next);
  });

  return router;
}
