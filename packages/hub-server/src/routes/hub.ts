import { Router } from 'express';
import type { AppContext } from '../context.js';
import { asyncHandler } from '../middleware/errors.js';
import {
  bodyOf,
  processInboxSchema,
  registerAgentSchema,
  sendMessageSchema,
  validate,
} from '../middleware/validation.js';

export function createHubRouter(ctx: AppContext): Router {
  const router = Router();

  // POST /hub/agents: register (or re-register) an agent; does not touch the profile store
  router.post('/agents', validate(registerAgentSchema), (req, res) => {
    res.json(ctx.hub.register(bodyOf(registerAgentSchema, req)));
  });

  router.get('/agents', (_req, res) => {
    const agents = ctx.hub.listAgents().map((a) => ({
      ...a,
      pendingMessages: ctx.hub.pending(a.agentId),
    }));
    res.json(agents);
  });

  router.post('/messages', validate(sendMessageSchema), (req, res) => {
    const { from, to, payload } = bodyOf(sendMessageSchema, req);
    res.json(ctx.hub.send(from, to, payload));
  });

  // GET /hub/inbox/:agentId: drains the mailbox unless ?clear=false
  router.get('/inbox/:agentId', (req, res) => {
    const clear = req.query['clear'] !== 'false';
    res.json(ctx.hub.receive(req.params['agentId'], clear));
  });

  router.post('/agents/:agentId/process', validate(processInboxSchema), asyncHandler(async (req, res) => {
    const { maxMessages } = bodyOf(processInboxSchema, req);
    res.json(await ctx.worker.process(req.params['agentId'], maxMessages ?? ctx.workerMaxMessages));
  }));

  return router;
}
