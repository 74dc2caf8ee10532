// server/src/routes/seasons.ts

import { Router } from 'express';
import { sendError } from '../errors.js';
import type { ApiContext } from './context.js';

export default function seasons({ board, defaultSeason, availableSeasons }: ApiContext): Router {
  const r = Router();

  r.get('/seasons', async (_req, res) => {
    try {
      const stored = await board.listSeasons();
      const available = [...new Set([...availableSeasons, ...stored])].sort().reverse();
      res.json({ current: defaultSeason, available });
    } catch (error) {
      sendError(res, error, 'Error listing seasons', 'Failed to list seasons');
    }
  });

  return r;
}
