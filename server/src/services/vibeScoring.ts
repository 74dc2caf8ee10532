// server/src/services/vibeScoring.ts

import type { PlayerStatLine, PositionGroup, ReferenceDistributions, ScoredPlayer } from '../types.js';
import { defensivePer100Rates, per100Rates, trueShooting } from './rates.js';
import { classifyPosition } from './positionGroups.js';
import { zScore } from './stats.js';

export const OFFENSE_WEIGHTS = {
  trueShooting: 1.8,
  points100: 1.2,
  assists100: 1.3,
  offensiveRebounds100: 0.8,
  turnovers100: -1.4
} as const;

export const DEFENSE_WEIGHTS = {
  steals100: 1.3,
  blocks100: 1.1,
  defensiveRebounds100: 0.5,
  fouls100: -1.0
} as const;

export const SKILL_OFFENSE_WEIGHT = 0.6;
export const SKILL_DEFENSE_WEIGHT = 0.4;
export const RAW_SKILL_WEIGHT = 0.65;
export const RAW_IMPACT_WEIGHT = 0.35;

/** Minutes at which a player's composite is shrunk by half. */
export const SHRINKAGE_MINUTES = 600;

/**
 * OVIBE = 1.8 zTS + 1.2 zPTS100 + 1.3 zAST100 + 0.8 zORB100 - 1.4 zTOV100
 * Every term is measured against the league-wide distribution.
 */
export function offensiveZ(line: PlayerStatLine, distributions: ReferenceDistributions): number {
  const rates = per100Rates(line);
  const { league } = distributions;

  return (
    OFFENSE_WEIGHTS.trueShooting * zScore(trueShooting(line), league.trueShooting) +
    OFFENSE_WEIGHTS.points100 * zScore(rates.points100, league.points100) +
    OFFENSE_WEIGHTS.assists100 * zScore(rates.assists100, league.assists100) +
    OFFENSE_WEIGHTS.offensiveRebounds100 * zScore(rates.offensiveRebounds100, league.offensiveRebounds100) +
    OFFENSE_WEIGHTS.turnovers100 * zScore(rates.turnovers100, league.turnovers100)
  );
}

/**
 * DVIBE = 1.3 zSTL100 + 1.1 zBLK100 + 0.5 zDRB100 - 1.0 zPF100, against the
 * player's own position group. A group without a distribution contributes 0;
 * there is no league-wide defensive fallback.
 */
export function defensiveZ(
  line: PlayerStatLine,
  distributions: ReferenceDistributions,
  position: PositionGroup = classifyPosition(line)
): number {
  const group = distributions.byPosition[position];
  if (!group) return 0;

  const rates = defensivePer100Rates(line);

  return (
    DEFENSE_WEIGHTS.steals100 * zScore(rates.steals100, group.steals100) +
    DEFENSE_WEIGHTS.blocks100 * zScore(rates.blocks100, group.blocks100) +
    DEFENSE_WEIGHTS.defensiveRebounds100 * zScore(rates.defensiveRebounds100, group.defensiveRebounds100) +
    DEFENSE_WEIGHTS.fouls100 * zScore(rates.fouls100, group.fouls100)
  );
}

export function impactZ(line: PlayerStatLine, distributions: ReferenceDistributions): number {
  return zScore(per100Rates(line).plusMinus100, distributions.league.plusMinus100);
}

export function shrinkFactor(minutes: number): number {
  const played = Math.max(minutes, 0);
  return played / (played + SHRINKAGE_MINUTES);
}

export function scorePlayer(line: PlayerStatLine, distributions: ReferenceDistributions): ScoredPlayer {
  const positionGroup = classifyPosition(line);

  const ovibe = offensiveZ(line, distributions);
  const dvibe = defensiveZ(line, distributions, positionGroup);
  const impact = impactZ(line, distributions);

  const skill = SKILL_OFFENSE_WEIGHT * ovibe + SKILL_DEFENSE_WEIGHT * dvibe;
  const vibeRaw = RAW_SKILL_WEIGHT * skill + RAW_IMPACT_WEIGHT * impact;

  // Low-minute players regress toward league average
  const shrink = shrinkFactor(line.minutes);

  return {
    playerId: line.playerId,
    positionGroup,
    ovibe,
    dvibe,
    impact,
    skill,
    vibeRaw,
    vibeShrunk: vibeRaw * shrink,
    minutes: line.minutes,
    shrinkFactor: shrink
  };
}
