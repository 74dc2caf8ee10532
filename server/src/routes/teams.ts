// server/src/routes/teams.ts

import { Router } from 'express';
import { sendError } from '../errors.js';
import { resolveSeason, type ApiContext } from './context.js';

export default function teams({ board, defaultSeason }: ApiContext): Router {
  const r = Router();

  r.get('/teams', async (req, res) => {
    try {
      const season = resolveSeason(req.query.season, defaultSeason);
      const rows = await board.getTeamBoard(season);
      res.json({ season, count: rows.length, teams: rows });
    } catch (error) {
      sendError(res, error, 'Error fetching teams', 'Failed to fetch teams');
    }
  });

  return r;
}
