// server/src/services/csvMapping.ts

import { PlayerStatLineInputSchema, TeamStatLineInputSchema, formatValidationError } from '../schemas/statLine.js';
import type { PlayerStatLine, TeamStatLine } from '../types.js';

// Column headers as exported from the league's stats pages
export interface PlayerCsvRow {
  PLAYER_ID: string;
  PLAYER_NAME?: string;
  TEAM_ABBREVIATION?: string;
  GP?: string;
  MIN?: string;
  PTS?: string;
  AST?: string;
  OREB?: string;
  DREB?: string;
  FGM?: string;
  FGA?: string;
  FG3M?: string;
  FG3A?: string;
  FTM?: string;
  FTA?: string;
  TOV?: string;
  STL?: string;
  BLK?: string;
  PF?: string;
  PLUS_MINUS?: string;
}

export interface TeamCsvRow {
  TEAM_ID: string;
  TEAM_NAME: string;
  TEAM_ABBREVIATION?: string;
  GP?: string;
  W?: string;
  L?: string;
  PTS?: string;
  OPP_PTS?: string;
  FGM?: string;
  FGA?: string;
  FTA?: string;
  TOV?: string;
  REB?: string;
  AST?: string;
  FG_PCT?: string;
  FG3_PCT?: string;
}

export type RowResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export function mapPlayerCsvRow(row: PlayerCsvRow): RowResult<PlayerStatLine> {
  const parsed = PlayerStatLineInputSchema.safeParse({
    playerId: row.PLAYER_ID,
    playerName: row.PLAYER_NAME,
    teamAbbreviation: row.TEAM_ABBREVIATION,
    gamesPlayed: row.GP,
    minutes: row.MIN,
    points: row.PTS,
    assists: row.AST,
    offensiveRebounds: row.OREB,
    defensiveRebounds: row.DREB,
    fieldGoalsMade: row.FGM,
    fieldGoalsAttempted: row.FGA,
    threePointersMade: row.FG3M,
    threePointersAttempted: row.FG3A,
    freeThrowsMade: row.FTM,
    freeThrowsAttempted: row.FTA,
    turnovers: row.TOV,
    steals: row.STL,
    blocks: row.BLK,
    personalFouls: row.PF,
    plusMinus: row.PLUS_MINUS
  });

  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, errors: formatValidationError(parsed.error) };
}

export function mapTeamCsvRow(row: TeamCsvRow): RowResult<TeamStatLine> {
  const parsed = TeamStatLineInputSchema.safeParse({
    teamId: row.TEAM_ID,
    teamName: row.TEAM_NAME,
    teamAbbreviation: row.TEAM_ABBREVIATION,
    gamesPlayed: row.GP,
    wins: row.W,
    losses: row.L,
    points: row.PTS,
    opponentPoints: row.OPP_PTS,
    fieldGoalsMade: row.FGM,
    fieldGoalsAttempted: row.FGA,
    freeThrowsAttempted: row.FTA,
    turnovers: row.TOV,
    rebounds: row.REB,
    assists: row.AST,
    fieldGoalPct: row.FG_PCT,
    threePointPct: row.FG3_PCT
  });

  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, errors: formatValidationError(parsed.error) };
}
