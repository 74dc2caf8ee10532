// server/src/index.ts

import { config } from './config.js';
import { syncModels } from './models/index.js';
import { sequelizeSeasonStats } from './repositories/seasonStatsRepository.js';
import { createApp } from './app.js';

const { app } = createApp(sequelizeSeasonStats, {
  defaultSeason: config.defaultSeason,
  availableSeasons: config.availableSeasons,
  board: config.vibe
});

(async () => {
  await syncModels();
  app.listen(config.port, () => console.log(`API on http://localhost:${config.port}`));
})().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
