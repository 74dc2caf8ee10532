// server/src/scripts/migrate.ts
// Usage: tsx server/src/scripts/migrate.ts

import { sequelize } from '../db.js';
import { Player, PlayerSeasonStat, TeamSeasonStat } from '../models/index.js';

async function migrate() {
  try {
    await sequelize.authenticate();
    await sequelize.sync({ alter: true });
    const tables = [Player, PlayerSeasonStat, TeamSeasonStat].map(model => model.tableName);
    console.log(`Schema synced for ${tables.length} tables: ${tables.join(', ')}`);
  } finally {
    await sequelize.close();
  }
}

migrate().catch(error => {
  console.error('Schema sync failed:', error);
  process.exitCode = 1;
});
