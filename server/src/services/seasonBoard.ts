// server/src/services/seasonBoard.ts

import type { SeasonStatsSource } from '../repositories/seasonStatsRepository.js';
import type { PlayerStatLine, PositionGroup, TeamStatLine, VibeConfig } from '../types.js';
import { NotFoundError } from '../errors.js';
import { SeasonCache } from './seasonCache.js';
import { computeVibe, rankByVibe } from './vibePipeline.js';
import { classifyPosition } from './positionGroups.js';
import { playerAdvancedMetrics, type PlayerAdvancedMetrics } from './playerMetrics.js';
import { teamAdvancedMetrics, type TeamAdvancedMetrics } from './teamMetrics.js';
import { vibeTier, type VibeTier } from './leagueNormalizer.js';
import { DEFAULT_MIN_MINUTES } from './referenceDistributions.js';

export interface PlayerBoardRow extends PlayerAdvancedMetrics {
  playerId: number;
  playerName: string | null;
  teamAbbreviation: string | null;
  gamesPlayed: number;
  minutes: number;
  points: number;
  positionGroup: PositionGroup;
  vibe: number;
  tier: VibeTier;
  ovibe: number;
  dvibe: number;
  impact: number;
}

export interface TeamBoardRow extends TeamStatLine, TeamAdvancedMetrics {}

export interface SeasonBoardOptions extends VibeConfig {
  minGamesPlayed: number;
}

export const DEFAULT_BOARD_OPTIONS: SeasonBoardOptions = { minMinutes: DEFAULT_MIN_MINUTES, minGamesPlayed: 10 };

/**
 * Season leaderboards built from the stored totals. Each season's board is
 * computed once and memoized; nothing computed here is written back to the store.
 */
export class SeasonBoardService {
  private readonly players = new SeasonCache<PlayerBoardRow[]>();
  private readonly teams = new SeasonCache<TeamBoardRow[]>();
  private readonly options: SeasonBoardOptions;

  constructor(private readonly source: SeasonStatsSource, options: Partial<SeasonBoardOptions> = {}) {
    this.options = { ...DEFAULT_BOARD_OPTIONS, ...options };
  }

  async getPlayerBoard(season: string): Promise<PlayerBoardRow[]> {
    if (this.players.has(season)) {
      console.log(`Using cached VIBE board for ${season}`);
    }
    return this.players.getOrCompute(season, () => this.buildPlayerBoard(season));
  }

  async getPlayer(season: string, playerId: number): Promise<PlayerBoardRow> {
    const board = await this.getPlayerBoard(season);
    const row = board.find(p => p.playerId === playerId);
    if (!row) {
      throw new NotFoundError(`Player ${playerId} not found for ${season}`);
    }
    return row;
  }

  async getTeamBoard(season: string): Promise<TeamBoardRow[]> {
    return this.teams.getOrCompute(season, async () => {
      const lines = await this.source.listTeamStatLines(season);
      return lines
        .map(team => ({ ...team, ...teamAdvancedMetrics(team) }))
        .sort((a, b) => b.wins - a.wins || a.teamId - b.teamId);
    });
  }

  async listSeasons(): Promise<string[]> {
    return this.source.listSeasons();
  }

  invalidate(season?: string): void {
    if (season) {
      this.players.delete(season);
      this.teams.delete(season);
      return;
    }
    this.players.clear();
    this.teams.clear();
  }

  private async buildPlayerBoard(season: string): Promise<PlayerBoardRow[]> {
    console.log(`Computing VIBE board for ${season}...`);
    const lines = await this.source.listPlayerStatLines(season);
    const eligible = this.eligiblePlayers(lines);

    const results = new Map(
      computeVibe(eligible, { minMinutes: this.options.minMinutes }).map(r => [r.playerId, r])
    );

    const rows = eligible.map(line => {
      const result = results.get(line.playerId);
      // Every eligible player is scored; the defaults only guard a duplicate id
      const vibe = result?.vibe ?? 100;
      return {
        playerId: line.playerId,
        playerName: line.playerName ?? null,
        teamAbbreviation: line.teamAbbreviation ?? null,
        gamesPlayed: line.gamesPlayed,
        minutes: line.minutes,
        points: line.points,
        positionGroup: result?.positionGroup ?? classifyPosition(line),
        vibe,
        tier: vibeTier(vibe),
        ovibe: result?.ovibe ?? 0,
        dvibe: result?.dvibe ?? 0,
        impact: result?.impact ?? 0,
        ...playerAdvancedMetrics(line)
      };
    });

    console.log(`VIBE board for ${season} ready: ${rows.length} players`);
    return rankByVibe(rows);
  }

  // Very short stints are dropped before scoring; if that empties the season, keep everyone
  private eligiblePlayers(lines: PlayerStatLine[]): PlayerStatLine[] {
    const eligible = lines.filter(l => l.gamesPlayed >= this.options.minGamesPlayed);
    return eligible.length > 0 ? eligible : lines;
  }
}
