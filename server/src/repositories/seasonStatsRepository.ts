// server/src/repositories/seasonStatsRepository.ts

import { Player, PlayerSeasonStat, TeamSeasonStat } from '../models/index.js';
import type { PlayerStatLine, TeamStatLine } from '../types.js';

/** Where the season board reads its input totals from. */
export interface SeasonStatsSource {
  listPlayerStatLines(season: string): Promise<PlayerStatLine[]>;
  listTeamStatLines(season: string): Promise<TeamStatLine[]>;
  listSeasons(): Promise<string[]>;
}

export function toPlayerStatLine(row: PlayerSeasonStat): PlayerStatLine {
  return {
    playerId: row.playerId,
    playerName: row.player?.fullName,
    teamAbbreviation: row.teamAbbreviation ?? undefined,
    gamesPlayed: row.gamesPlayed ?? 0,
    minutes: row.minutes ?? 0,
    points: row.points ?? 0,
    assists: row.assists ?? 0,
    offensiveRebounds: row.offensiveRebounds ?? 0,
    defensiveRebounds: row.defensiveRebounds ?? 0,
    fieldGoalsMade: row.fieldGoalsMade ?? 0,
    fieldGoalsAttempted: row.fieldGoalsAttempted ?? 0,
    threePointersMade: row.threePointersMade ?? 0,
    threePointersAttempted: row.threePointersAttempted ?? 0,
    freeThrowsMade: row.freeThrowsMade ?? 0,
    freeThrowsAttempted: row.freeThrowsAttempted ?? 0,
    turnovers: row.turnovers ?? 0,
    steals: row.steals ?? 0,
    blocks: row.blocks ?? 0,
    personalFouls: row.personalFouls ?? 0,
    plusMinus: row.plusMinus ?? 0
  };
}

export function toTeamStatLine(row: TeamSeasonStat): TeamStatLine {
  return {
    teamId: row.teamId,
    teamName: row.teamName,
    teamAbbreviation: row.teamAbbreviation,
    gamesPlayed: row.gamesPlayed ?? 0,
    wins: row.wins ?? 0,
    losses: row.losses ?? 0,
    points: row.points ?? 0,
    opponentPoints: row.opponentPoints,
    fieldGoalsMade: row.fieldGoalsMade ?? 0,
    fieldGoalsAttempted: row.fieldGoalsAttempted ?? 0,
    freeThrowsAttempted: row.freeThrowsAttempted ?? 0,
    turnovers: row.turnovers ?? 0,
    rebounds: row.rebounds ?? 0,
    assists: row.assists ?? 0,
    fieldGoalPct: row.fieldGoalPct,
    threePointPct: row.threePointPct
  };
}

export const sequelizeSeasonStats: SeasonStatsSource = {
  async listPlayerStatLines(season) {
    const rows = await PlayerSeasonStat.findAll({
      where: { season },
      include: [{ model: Player, as: 'player', attributes: ['fullName'] }],
      order: [['playerId', 'ASC']]
    });
    return rows.map(toPlayerStatLine);
  },

  async listTeamStatLines(season) {
    const rows = await TeamSeasonStat.findAll({
      where: { season },
      order: [['teamId', 'ASC']]
    });
    return rows.map(toTeamStatLine);
  },

  async listSeasons() {
    const rows = await PlayerSeasonStat.findAll({
      attributes: ['season'],
      group: ['season'],
      order: [['season', 'DESC']]
    });
    return rows.map(row => row.season);
  }
};
