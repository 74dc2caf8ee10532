// server/src/types.ts

export type PositionGroup = 'GUARD' | 'WING' | 'BIG';

export const POSITION_GROUPS: readonly PositionGroup[] = ['GUARD', 'WING', 'BIG'];

/**
 * Season totals for one player, already validated and defaulted at the boundary.
 * Read-only to the scoring pipeline.
 */
export interface PlayerStatLine {
  readonly playerId: number;
  readonly playerName?: string;
  readonly teamAbbreviation?: string;
  readonly gamesPlayed: number;
  readonly minutes: number;
  readonly points: number;
  readonly assists: number;
  readonly offensiveRebounds: number;
  readonly defensiveRebounds: number;
  readonly fieldGoalsMade: number;
  readonly fieldGoalsAttempted: number;
  readonly threePointersMade: number;
  readonly threePointersAttempted: number;
  readonly freeThrowsMade: number;
  readonly freeThrowsAttempted: number;
  readonly turnovers: number;
  readonly steals: number;
  readonly blocks: number;
  readonly personalFouls: number;
  readonly plusMinus: number;
}

export interface Per100Rates {
  points100: number;
  assists100: number;
  offensiveRebounds100: number;
  defensiveRebounds100: number;
  steals100: number;
  blocks100: number;
  turnovers100: number;
  fouls100: number;
  plusMinus100: number;
}

export type DefensiveRates = Pick<Per100Rates, 'defensiveRebounds100' | 'steals100' | 'blocks100' | 'fouls100'>;

export interface StatDistribution {
  mean: number;
  std: number;
}

export interface LeagueDistributions {
  trueShooting: StatDistribution;
  points100: StatDistribution;
  assists100: StatDistribution;
  offensiveRebounds100: StatDistribution;
  turnovers100: StatDistribution;
  plusMinus100: StatDistribution;
}

export type DefensiveDistributions = { [K in keyof DefensiveRates]: StatDistribution };

export interface ReferenceDistributions {
  league: LeagueDistributions;
  /** Only groups with enough qualified players get an entry. */
  byPosition: Partial<Record<PositionGroup, DefensiveDistributions>>;
  qualifiedCount: number;
  usedFallbackPopulation: boolean;
}

/** Per-player composite before the league rescale. */
export interface ScoredPlayer {
  playerId: number;
  positionGroup: PositionGroup;
  ovibe: number;
  dvibe: number;
  impact: number;
  skill: number;
  vibeRaw: number;
  vibeShrunk: number;
  minutes: number;
  shrinkFactor: number;
}

export interface VibeResult extends ScoredPlayer {
  vibe: number;
}

export interface VibeConfig {
  minMinutes: number;
}

export interface TeamStatLine {
  readonly teamId: number;
  readonly teamName: string;
  readonly teamAbbreviation: string;
  readonly gamesPlayed: number;
  readonly wins: number;
  readonly losses: number;
  readonly points: number;
  readonly opponentPoints: number | null;
  readonly fieldGoalsMade: number;
  readonly fieldGoalsAttempted: number;
  readonly freeThrowsAttempted: number;
  readonly turnovers: number;
  readonly rebounds: number;
  readonly assists: number;
  readonly fieldGoalPct: number | null;
  readonly threePointPct: number | null;
}
