// server/src/models/Player.ts


import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, NonAttribute, Sequelize
} from 'sequelize';
import type { PlayerSeasonStat } from './PlayerSeasonStat.js';

export class Player extends Model<InferAttributes<Player>, InferCreationAttributes<Player>> {
  declare id: CreationOptional<number>;
  declare playerId: number;
  declare fullName: string;
  declare teamAbbreviation: string | null;

  declare seasonStats?: NonAttribute<PlayerSeasonStat[]>;
}

export function initPlayer(sequelize: Sequelize) {
  Player.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      playerId: { type: DataTypes.INTEGER, allowNull: false, unique: true },
      fullName: { type: DataTypes.STRING(120), allowNull: false },
      teamAbbreviation: { type: DataTypes.STRING(5), allowNull: true }
    },
    { sequelize, tableName: 'players', modelName: 'Player', timestamps: true, indexes: [{ fields: ['playerId'] }, { fields: ['fullName'] }] }
  );
  return Player;
}
