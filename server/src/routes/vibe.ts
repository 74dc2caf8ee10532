// server/src/routes/vibe.ts

import { Router } from 'express';
import { sendError } from '../errors.js';
import { InvalidateRequestSchema, VibeRequestSchema } from '../schemas/statLine.js';
import { computeVibe, rankByVibe } from '../services/vibePipeline.js';
import { getVibeMethodology } from '../services/methodology.js';
import { resolveSeason, type ApiContext } from './context.js';

export default function vibe({ board, defaultSeason }: ApiContext): Router {
  const r = Router();

  // Registered before /vibe/:season so it is not read as a season
  r.get('/vibe/methodology', (_req, res) => {
    res.json(getVibeMethodology());
  });

  // Scores an ad-hoc population; nothing is cached or stored
  r.post('/vibe', (req, res) => {
    try {
      const { players, minMinutes } = VibeRequestSchema.parse(req.body ?? {});
      const results = rankByVibe(computeVibe(players, minMinutes === undefined ? {} : { minMinutes }));
      res.json({ count: results.length, results });
    } catch (error) {
      sendError(res, error, 'VIBE calculation error', 'Failed to calculate VIBE');
    }
  });

  r.post('/vibe/cache/invalidate', (req, res) => {
    try {
      const { season } = InvalidateRequestSchema.parse(req.body ?? {});
      board.invalidate(season);
      res.json({ invalidated: season ?? 'all' });
    } catch (error) {
      sendError(res, error, 'Cache invalidation error', 'Failed to invalidate cache');
    }
  });

  r.get('/vibe/:season', async (req, res) => {
    try {
      const season = resolveSeason(req.params.season, defaultSeason);
      const rows = await board.getPlayerBoard(season);
      const leaderboard = rows.map(({ playerId, playerName, teamAbbreviation, positionGroup, vibe, tier, ovibe, dvibe, impact, minutes }) => ({
        playerId, playerName, teamAbbreviation, positionGroup, vibe, tier, ovibe, dvibe, impact, minutes
      }));
      res.json({ season, count: leaderboard.length, leaderboard });
    } catch (error) {
      sendError(res, error, 'VIBE leaderboard error', 'Failed to build VIBE leaderboard');
    }
  });

  return r;
}
