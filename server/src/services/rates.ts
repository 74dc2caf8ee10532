// server/src/services/rates.ts

import type { DefensiveRates, Per100Rates, PlayerStatLine } from '../types.js';

// 48 minutes x 5 players on the floor
const MINUTES_PER_TEAM_GAME = 240;

const ZERO_RATES: Per100Rates = {
  points100: 0,
  assists100: 0,
  offensiveRebounds100: 0,
  defensiveRebounds100: 0,
  steals100: 0,
  blocks100: 0,
  turnovers100: 0,
  fouls100: 0,
  plusMinus100: 0
};

/**
 * Player possessions estimate: MIN x 100 / 240.
 * Zero or negative minutes clamp to a single possession so rates stay finite.
 */
export function estimatePossessions(minutes: number): number {
  if (!minutes || minutes <= 0) return 1;
  return (minutes * 100) / MINUTES_PER_TEAM_GAME;
}

export function per100Rates(line: PlayerStatLine): Per100Rates {
  const possessions = estimatePossessions(line.minutes);
  if (possessions <= 0) return { ...ZERO_RATES };

  const per100 = (total: number) => (total * 100) / possessions;

  return {
    points100: per100(line.points),
    assists100: per100(line.assists),
    offensiveRebounds100: per100(line.offensiveRebounds),
    defensiveRebounds100: per100(line.defensiveRebounds),
    steals100: per100(line.steals),
    blocks100: per100(line.blocks),
    turnovers100: per100(line.turnovers),
    fouls100: per100(line.personalFouls),
    plusMinus100: per100(line.plusMinus)
  };
}

export function defensivePer100Rates(line: PlayerStatLine): DefensiveRates {
  const { defensiveRebounds100, steals100, blocks100, fouls100 } = per100Rates(line);
  return { defensiveRebounds100, steals100, blocks100, fouls100 };
}

/**
 * TS% = PTS / (2 x TSA), TSA = FGA + 0.44 x FTA
 */
export function trueShootingAttempts(fieldGoalsAttempted: number, freeThrowsAttempted: number): number {
  return fieldGoalsAttempted + 0.44 * freeThrowsAttempted;
}

export function trueShooting(line: Pick<PlayerStatLine, 'points' | 'fieldGoalsAttempted' | 'freeThrowsAttempted'>): number {
  const tsa = trueShootingAttempts(line.fieldGoalsAttempted, line.freeThrowsAttempted);
  if (tsa <= 0) return 0;
  return line.points / (2 * tsa);
}
