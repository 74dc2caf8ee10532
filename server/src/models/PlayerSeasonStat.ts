// server/src/models/PlayerSeasonStat.ts

import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, ForeignKey, NonAttribute, Sequelize
} from 'sequelize';
import type { Player } from './Player.js';

// Imported season totals only; computed ratings are never written back
export class PlayerSeasonStat
  extends Model<InferAttributes<PlayerSeasonStat>, InferCreationAttributes<PlayerSeasonStat>> {
  declare id: CreationOptional<number>;
  declare playerId: ForeignKey<Player['playerId']>;
  declare season: string;
  declare teamAbbreviation: string | null;

  declare gamesPlayed: number;
  declare minutes: number;
  declare points: number;
  declare assists: number;
  declare offensiveRebounds: number;
  declare defensiveRebounds: number;
  declare rebounds: number;
  declare fieldGoalsMade: number;
  declare fieldGoalsAttempted: number;
  declare threePointersMade: number;
  declare threePointersAttempted: number;
  declare freeThrowsMade: number;
  declare freeThrowsAttempted: number;
  declare turnovers: number;
  declare steals: number;
  declare blocks: number;
  declare personalFouls: number;
  declare plusMinus: number;

  declare player?: NonAttribute<Player>;
}

export function initPlayerSeasonStat(sequelize: Sequelize) {
  PlayerSeasonStat.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      playerId: { type: DataTypes.INTEGER, allowNull: false },
      season: { type: DataTypes.STRING(7), allowNull: false },
      teamAbbreviation: { type: DataTypes.STRING(5), allowNull: true },

      gamesPlayed: { type: DataTypes.INTEGER, defaultValue: 0 },
      minutes: { type: DataTypes.FLOAT, defaultValue: 0 },
      points: { type: DataTypes.INTEGER, defaultValue: 0 },
      assists: { type: DataTypes.INTEGER, defaultValue: 0 },
      offensiveRebounds: { type: DataTypes.INTEGER, defaultValue: 0 },
      defensiveRebounds: { type: DataTypes.INTEGER, defaultValue: 0 },
      rebounds: { type: DataTypes.INTEGER, defaultValue: 0 },
      fieldGoalsMade: { type: DataTypes.INTEGER, defaultValue: 0 },
      fieldGoalsAttempted: { type: DataTypes.INTEGER, defaultValue: 0 },
      threePointersMade: { type: DataTypes.INTEGER, defaultValue: 0 },
      threePointersAttempted: { type: DataTypes.INTEGER, defaultValue: 0 },
      freeThrowsMade: { type: DataTypes.INTEGER, defaultValue: 0 },
      freeThrowsAttempted: { type: DataTypes.INTEGER, defaultValue: 0 },
      turnovers: { type: DataTypes.INTEGER, defaultValue: 0 },
      steals: { type: DataTypes.INTEGER, defaultValue: 0 },
      blocks: { type: DataTypes.INTEGER, defaultValue: 0 },
      personalFouls: { type: DataTypes.INTEGER, defaultValue: 0 },
      plusMinus: { type: DataTypes.INTEGER, defaultValue: 0 }
    },
    {
      sequelize,
      tableName: 'player_season_stats',
      modelName: 'PlayerSeasonStat',
      indexes: [
        { unique: true, fields: ['season', 'playerId'] },
        { fields: ['teamAbbreviation', 'season'] }
      ]
    }
  );
  return PlayerSeasonStat;
}
