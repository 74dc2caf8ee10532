// server/src/services/playerMetrics.ts

import type { PlayerStatLine } from '../types.js';
import { trueShooting } from './rates.js';

export interface PlayerAdvancedMetrics {
  ppg: number;
  rpg: number;
  apg: number;
  tsPct: number;
  per: number;
  usgPct: number;
  fgPct: number;
  fg3Pct: number;
  ftPct: number;
}

const pct = (made: number, attempted: number) => (attempted > 0 ? made / attempted : 0);

/**
 * Per-game and efficiency figures shown next to VIBE on the season board.
 * PER and usage are simplified box-score estimates, not the league's official versions.
 */
export function playerAdvancedMetrics(line: PlayerStatLine): PlayerAdvancedMetrics {
  const games = Math.max(line.gamesPlayed, 1);
  const rebounds = line.offensiveRebounds + line.defensiveRebounds;

  const missedFieldGoals = line.fieldGoalsAttempted - line.fieldGoalsMade;
  const missedFreeThrows = line.freeThrowsAttempted - line.freeThrowsMade;
  const per = (
    line.points + rebounds + line.assists + line.steals + line.blocks
    - line.turnovers - missedFieldGoals - missedFreeThrows
  ) / games;

  const usgPct = line.minutes > 0
    ? (line.fieldGoalsAttempted + 0.44 * line.freeThrowsAttempted + line.turnovers) / line.minutes * 100
    : 0;

  return {
    ppg: line.points / games,
    rpg: rebounds / games,
    apg: line.assists / games,
    tsPct: trueShooting(line),
    per,
    usgPct,
    fgPct: pct(line.fieldGoalsMade, line.fieldGoalsAttempted),
    fg3Pct: pct(line.threePointersMade, line.threePointersAttempted),
    ftPct: pct(line.freeThrowsMade, line.freeThrowsAttempted)
  };
}
