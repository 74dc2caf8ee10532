// server/src/models/TeamSeasonStat.ts

import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, Sequelize
} from 'sequelize';

export class TeamSeasonStat
  extends Model<InferAttributes<TeamSeasonStat>, InferCreationAttributes<TeamSeasonStat>> {
  declare id: CreationOptional<number>;
  declare teamId: number;
  declare season: string;
  declare teamName: string;
  declare teamAbbreviation: string;

  declare gamesPlayed: number;
  declare wins: number;
  declare losses: number;
  declare points: number;
  declare opponentPoints: number | null;
  declare fieldGoalsMade: number;
  declare fieldGoalsAttempted: number;
  declare freeThrowsAttempted: number;
  declare turnovers: number;
  declare rebounds: number;
  declare assists: number;
  declare fieldGoalPct: number | null;
  declare threePointPct: number | null;
}

export function initTeamSeasonStat(sequelize: Sequelize) {
  TeamSeasonStat.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      teamId: { type: DataTypes.INTEGER, allowNull: false },
      season: { type: DataTypes.STRING(7), allowNull: false },
      teamName: { type: DataTypes.STRING(100), allowNull: false },
      teamAbbreviation: { type: DataTypes.STRING(5), allowNull: false },

      gamesPlayed: { type: DataTypes.INTEGER, defaultValue: 0 },
      wins: { type: DataTypes.INTEGER, defaultValue: 0 },
      losses: { type: DataTypes.INTEGER, defaultValue: 0 },
      points: { type: DataTypes.INTEGER, defaultValue: 0 },
      opponentPoints: { type: DataTypes.INTEGER, allowNull: true },
      fieldGoalsMade: { type: DataTypes.INTEGER, defaultValue: 0 },
      fieldGoalsAttempted: { type: DataTypes.INTEGER, defaultValue: 0 },
      freeThrowsAttempted: { type: DataTypes.INTEGER, defaultValue: 0 },
      turnovers: { type: DataTypes.INTEGER, defaultValue: 0 },
      rebounds: { type: DataTypes.INTEGER, defaultValue: 0 },
      assists: { type: DataTypes.INTEGER, defaultValue: 0 },
      fieldGoalPct: { type: DataTypes.FLOAT, allowNull: true },
      threePointPct: { type: DataTypes.FLOAT, allowNull: true }
    },
    {
      sequelize,
      tableName: 'team_season_stats',
      modelName: 'TeamSeasonStat',
      indexes: [{ unique: true, fields: ['season', 'teamId'] }]
    }
  );
  return TeamSeasonStat;
}
