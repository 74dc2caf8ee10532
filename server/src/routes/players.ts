// server/src/routes/players.ts

import { Router } from 'express';
import { sendError, ValidationError } from '../errors.js';
import type { PlayerBoardRow } from '../services/seasonBoard.js';
import { parseLimit, resolveSeason, type ApiContext } from './context.js';

const SORTS = {
  vibe: (a: PlayerBoardRow, b: PlayerBoardRow) => b.vibe - a.vibe || a.playerId - b.playerId,
  ppg: (a: PlayerBoardRow, b: PlayerBoardRow) => b.ppg - a.ppg || a.playerId - b.playerId,
  pts: (a: PlayerBoardRow, b: PlayerBoardRow) => b.points - a.points || a.playerId - b.playerId
} as const;

type SortKey = keyof typeof SORTS;

const isSortKey = (value: string): value is SortKey => Object.prototype.hasOwnProperty.call(SORTS, value);

export default function players({ board, defaultSeason }: ApiContext): Router {
  const r = Router();

  /**
   * GET /players
   * Season board: display metrics merged with VIBE components
   */
  r.get('/players', async (req, res) => {
    try {
      const season = resolveSeason(req.query.season, defaultSeason);
      const sort = req.query.sort ?? 'vibe';
      if (typeof sort !== 'string' || !isSortKey(sort)) {
        throw new ValidationError(`sort must be one of: ${Object.keys(SORTS).join(', ')}`);
      }
      const limit = parseLimit(req.query.limit, 500);

      const rows = await board.getPlayerBoard(season);
      const sorted = [...rows].sort(SORTS[sort]).slice(0, limit);

      res.json({ season, count: sorted.length, players: sorted });
    } catch (error) {
      sendError(res, error, 'Error fetching players', 'Failed to fetch players');
    }
  });

  r.get('/players/:playerId', async (req, res) => {
    try {
      const playerId = Number(req.params.playerId);
      if (!Number.isInteger(playerId) || playerId <= 0) {
        throw new ValidationError('playerId must be a positive integer');
      }
      const season = resolveSeason(req.query.season, defaultSeason);
      const player = await board.getPlayer(season, playerId);
      res.json({ season, player });
    } catch (error) {
      sendError(res, error, 'Error fetching player', 'Failed to fetch player');
    }
  });

  return r;
}
