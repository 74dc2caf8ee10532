// server/src/services/positionGroups.ts

import type { PlayerStatLine, PositionGroup } from '../types.js';

export const BIG_REBOUNDS_PER_GAME = 7.0;
export const GUARD_ASSISTS_PER_GAME = 4.0;

// Rebounding is checked first, so a big who also passes stays a big
export function classifyPosition(
  line: Pick<PlayerStatLine, 'offensiveRebounds' | 'defensiveRebounds' | 'assists' | 'gamesPlayed'>
): PositionGroup {
  const games = Math.max(line.gamesPlayed, 1);
  const reboundsPerGame = (line.offensiveRebounds + line.defensiveRebounds) / games;
  const assistsPerGame = line.assists / games;

  if (reboundsPerGame >= BIG_REBOUNDS_PER_GAME) return 'BIG';
  if (assistsPerGame >= GUARD_ASSISTS_PER_GAME) return 'GUARD';
  return 'WING';
}
