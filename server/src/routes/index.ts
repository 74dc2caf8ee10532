// server/src/routes/index.ts


import { Router } from 'express';
import type { ApiContext } from './context.js';
import health from './health.js';
import seasons from './seasons.js';
import players from './players.js';
import teams from './teams.js';
import vibe from './vibe.js';

export default function api(ctx: ApiContext): Router {
  const router = Router();
  router.use(health);
  router.use(seasons(ctx));
  router.use(players(ctx));
  router.use(teams(ctx));
  router.use(vibe(ctx));
  return router;
}
