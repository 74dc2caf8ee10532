// server/src/app.ts

import express from 'express';
import cors from 'cors';
import api from './routes/index.js';
import type { SeasonStatsSource } from './repositories/seasonStatsRepository.js';
import { SeasonBoardService, type SeasonBoardOptions } from './services/seasonBoard.js';

export interface AppOptions {
  defaultSeason: string;
  availableSeasons: string[];
  board?: Partial<SeasonBoardOptions>;
}

export function createApp(source: SeasonStatsSource, options: AppOptions) {
  const board = new SeasonBoardService(source, options.board);

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  app.use('/api', api({
    board,
    defaultSeason: options.defaultSeason,
    availableSeasons: options.availableSeasons
  }));

  return { app, board };
}
