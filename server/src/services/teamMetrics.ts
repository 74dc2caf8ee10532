// server/src/services/teamMetrics.ts

import type { TeamStatLine } from '../types.js';
import { trueShootingAttempts } from './rates.js';

export interface TeamAdvancedMetrics {
  offRating: number;
  defRating: number | null;
  netRating: number | null;
  tsPct: number;
  pace: number;
}

export function teamAdvancedMetrics(team: TeamStatLine): TeamAdvancedMetrics {
  const games = Math.max(team.gamesPlayed, 1);

  // Rough per-game ratings scaled by 100; the feed carries no team possessions
  const offRating = (team.points / games) * 100;
  const defRating = team.opponentPoints === null ? null : (team.opponentPoints / games) * 100;

  const tsa = trueShootingAttempts(team.fieldGoalsAttempted, team.freeThrowsAttempted);

  return {
    offRating,
    defRating,
    netRating: defRating === null ? null : offRating - defRating,
    tsPct: tsa > 0 ? team.points / (2 * tsa) : 0,
    pace: team.fieldGoalsAttempted + team.turnovers + 0.44 * team.freeThrowsAttempted
  };
}
