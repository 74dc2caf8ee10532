// server/src/routes/context.ts

import { SeasonSchema } from '../schemas/statLine.js';
import { ValidationError } from '../errors.js';
import type { SeasonBoardService } from '../services/seasonBoard.js';

export interface ApiContext {
  board: SeasonBoardService;
  defaultSeason: string;
  availableSeasons: string[];
}

export function resolveSeason(value: unknown, fallback: string): string {
  if (value === undefined || value === '') return fallback;
  const parsed = SeasonSchema.safeParse(value);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, 'Invalid season');
  }
  return parsed.data;
}

export function parseLimit(value: unknown, fallback: number, max = 1000): number {
  if (value === undefined || value === '') return fallback;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit must be a positive integer');
  }
  return Math.min(limit, max);
}
