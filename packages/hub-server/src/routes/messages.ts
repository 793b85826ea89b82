import { Router, type Request } from 'express';
import type { SseSessions } from '../mcp/server.js';
import { asyncHandler } from '../middleware/errors.js';

// The SSE transport advertises `/messages?sessionId=…`; the path form is kept too.
function sessionIdOf(req: Request): string | undefined {
  const fromPath = req.params['sessionId'];
  if (fromPath) return fromPath;
  const fromQuery = req.query['sessionId'];
  return typeof fromQuery === 'string' ? fromQuery : undefined;
}

export function createMessagesRouter(sessions: SseSessions): Router {
  const router = Router();

  router.post(['/', '/:sessionId'], asyncHandler(async (req, res) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? sessions.get(sessionId) : undefined;

    if (!transport) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    await transport.handlePostMessage(req, res, req.body);
  }));

  return router;
}
