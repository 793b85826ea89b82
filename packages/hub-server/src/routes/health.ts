import { Router } from 'express';
import type { AppContext } from '../context.js';
import { asyncHandler } from '../middleware/errors.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/', asyncHandler(async (_req, res) => {
    const profiles = await ctx.store.listProfileIds();

    res.json({
      status: 'ok',
      uptime: process.uptime(),
      agents: ctx.hub.listAgents().length,
      profiles: profiles.length,
    });
  }));

  return router;
}
