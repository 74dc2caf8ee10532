// server/src/services/referenceDistributions.ts

import { POSITION_GROUPS } from '../types.js';
import type {
  DefensiveDistributions,
  DefensiveRates,
  LeagueDistributions,
  Per100Rates,
  PlayerStatLine,
  PositionGroup,
  ReferenceDistributions
} from '../types.js';
import { defensivePer100Rates, per100Rates, trueShooting } from './rates.js';
import { classifyPosition } from './positionGroups.js';
import { distributionOf } from './stats.js';

export const DEFAULT_MIN_MINUTES = 200;
export const MIN_POSITION_GROUP_SIZE = 3;
export const LEAGUE_STD_FLOOR = 1.0;
export const POSITION_STD_FLOOR = 0.1;

// Every league std is at least 1.0; position stds at least 0.1
const leagueStd = (std: number) => Math.max(std, LEAGUE_STD_FLOOR);
const positionStd = (std: number) => Math.max(std, POSITION_STD_FLOOR);

interface QualifiedPlayer {
  position: PositionGroup;
  rates: Per100Rates;
  defense: DefensiveRates;
  trueShooting: number;
}

export interface DistributionOptions {
  minMinutes?: number;
}

export function selectQualified(
  population: readonly PlayerStatLine[],
  minMinutes: number = DEFAULT_MIN_MINUTES
): { players: readonly PlayerStatLine[]; usedFallback: boolean } {
  const qualified = population.filter(p => p.minutes >= minMinutes);
  if (qualified.length === 0) {
    return { players: population, usedFallback: true };
  }
  return { players: qualified, usedFallback: false };
}

function buildLeague(players: QualifiedPlayer[]): LeagueDistributions {
  const column = (pick: (p: QualifiedPlayer) => number) => distributionOf(players.map(pick), leagueStd);

  return {
    trueShooting: column(p => p.trueShooting),
    points100: column(p => p.rates.points100),
    assists100: column(p => p.rates.assists100),
    offensiveRebounds100: column(p => p.rates.offensiveRebounds100),
    turnovers100: column(p => p.rates.turnovers100),
    plusMinus100: column(p => p.rates.plusMinus100)
  };
}

function buildDefensive(players: QualifiedPlayer[]): DefensiveDistributions {
  const column = (pick: (d: DefensiveRates) => number) =>
    distributionOf(players.map(p => pick(p.defense)), positionStd);

  return {
    defensiveRebounds100: column(d => d.defensiveRebounds100),
    steals100: column(d => d.steals100),
    blocks100: column(d => d.blocks100),
    fouls100: column(d => d.fouls100)
  };
}

/**
 * Builds league-wide offensive/impact distributions and per-position defensive
 * distributions from the minutes-qualified population. When nobody qualifies the
 * whole population is used instead.
 */
export function buildReferenceDistributions(
  population: readonly PlayerStatLine[],
  options: DistributionOptions = {}
): ReferenceDistributions {
  const { players, usedFallback } = selectQualified(population, options.minMinutes ?? DEFAULT_MIN_MINUTES);

  const qualified: QualifiedPlayer[] = players.map(line => ({
    position: classifyPosition(line),
    rates: per100Rates(line),
    defense: defensivePer100Rates(line),
    trueShooting: trueShooting(line)
  }));

  const byPosition: Partial<Record<PositionGroup, DefensiveDistributions>> = {};
  for (const group of POSITION_GROUPS) {
    const members = qualified.filter(p => p.position === group);
    if (members.length < MIN_POSITION_GROUP_SIZE) continue;
    byPosition[group] = buildDefensive(members);
  }

  return {
    league: buildLeague(qualified),
    byPosition,
    qualifiedCount: qualified.length,
    usedFallbackPopulation: usedFallback
  };
}
