// server/src/models/index.ts


import { sequelize } from '../db.js';
import { initPlayer, Player } from './Player.js';
import { initPlayerSeasonStat, PlayerSeasonStat } from './PlayerSeasonStat.js';
import { initTeamSeasonStat, TeamSeasonStat } from './TeamSeasonStat.js';

initPlayer(sequelize);
initPlayerSeasonStat(sequelize);
initTeamSeasonStat(sequelize);

// associations
Player.hasMany(PlayerSeasonStat, { as: 'seasonStats', foreignKey: 'playerId', sourceKey: 'playerId' });
PlayerSeasonStat.belongsTo(Player, { as: 'player', foreignKey: 'playerId', targetKey: 'playerId' });

export { Player, PlayerSeasonStat, TeamSeasonStat };
export async function syncModels() {
  await sequelize.sync();
}
