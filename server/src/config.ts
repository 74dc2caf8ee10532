// server/src/config.ts

import 'dotenv/config';
import path from 'path';
import { z } from 'zod';
import { SeasonSchema } from './schemas/statLine.js';

export class ConfigError extends Error {
  constructor(public readonly keys: string[]) {
    super(`Invalid configuration: ${keys.join(', ')}`);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DB_NAME: z.string().default('vibe_ratings'),
  DB_USER: z.string().default('postgres'),
  DB_PASS: z.string().default('password'),
  DB_HOST: z.string().default('localhost'),
  VIBE_MIN_MINUTES: z.coerce.number().min(0).default(200),
  VIBE_MIN_GAMES: z.coerce.number().int().min(0).default(10),
  DEFAULT_SEASON: SeasonSchema.default('2024-25'),
  CSV_DIR: z.string().optional(),
});

export const AVAILABLE_SEASONS = ['2025-26', '2024-25', '2023-24', '2022-23', '2021-22', '2020-21'] as const;

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => issue.path.join('.')));
  }
  const e = parsed.data;
  const availableSeasons: string[] = [...AVAILABLE_SEASONS];

  return Object.freeze({
    port: e.PORT,
    db: { name: e.DB_NAME, user: e.DB_USER, pass: e.DB_PASS, host: e.DB_HOST },
    vibe: { minMinutes: e.VIBE_MIN_MINUTES, minGamesPlayed: e.VIBE_MIN_GAMES },
    defaultSeason: e.DEFAULT_SEASON,
    availableSeasons,
    csvDir: e.CSV_DIR ? path.resolve(e.CSV_DIR) : path.resolve(process.cwd(), 'csv'),
  });
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig();
