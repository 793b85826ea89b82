import { Router } from 'express';
import type { AppContext } from '../context.js';
import { HttpError } from '../errors.js';
import { asyncHandler } from '../middleware/errors.js';
import { bodyOf, profileBodySchema, searchSchema, validate } from '../middleware/validation.js';

export function createFreigentRouter(ctx: AppContext): Router {
  const router = Router();

  // POST /freigent/:userId/profile: store the profile and register its agent
  router.post('/:userId/profile', validate(profileBodySchema), asyncHandler(async (req, res) => {
    const userId = req.params['userId'];
    await ctx.freigent.saveProfile(userId, bodyOf(profileBodySchema, req));
    res.json({ status: 'ok', userId });
  }));

  router.get('/:userId/profile', asyncHandler(async (req, res) => {
    const userId = req.params['userId'];
    const profile = await ctx.freigent.getProfile(userId);
    if (!profile) throw new HttpError(404, `No profile stored for user_id '${userId}'`);
    res.json(profile);
  }));

  // POST /freigent/:userId/search: single agent, stored profile + query
  router.post('/:userId/search', validate(searchSchema), asyncHandler(async (req, res) => {
    const { query } = bodyOf(searchSchema, req);
    res.json(await ctx.freigent.search(req.params['userId'], query));
  }));

  // POST /freigent/:userId/auto_search: base agent plus every peer via the hub
  router.post('/:userId/auto_search', validate(searchSchema), asyncHandler(async (req, res) => {
    const { query } = bodyOf(searchSchema, req);
    res.json(await ctx.freigent.autoSearch(req.params['userId'], query));
  }));

  return router;
}
