// server/src/services/vibePipeline.ts

import type { PlayerStatLine, ReferenceDistributions, VibeConfig, VibeResult } from '../types.js';
import { buildReferenceDistributions, DEFAULT_MIN_MINUTES } from './referenceDistributions.js';
import { scorePlayer } from './vibeScoring.js';
import { normalizeLeague } from './leagueNormalizer.js';

export interface VibeRun {
  distributions: ReferenceDistributions;
  results: VibeResult[];
}

export const DEFAULT_VIBE_CONFIG: VibeConfig = { minMinutes: DEFAULT_MIN_MINUTES };

const byPlayerId = (a: { playerId: number }, b: { playerId: number }) => a.playerId - b.playerId;

/**
 * Runs the whole season in three passes: reference distributions over the
 * qualified population, a composite per player, then the league rescale.
 * Output is ordered by playerId regardless of input order.
 */
export function runVibePipeline(
  population: readonly PlayerStatLine[],
  config: Partial<VibeConfig> = {}
): VibeRun {
  const { minMinutes } = { ...DEFAULT_VIBE_CONFIG, ...config };
  const ordered = [...population].sort(byPlayerId);

  const distributions = buildReferenceDistributions(ordered, { minMinutes });
  const scored = ordered.map(line => scorePlayer(line, distributions));

  return { distributions, results: normalizeLeague(scored) };
}

export function computeVibe(population: readonly PlayerStatLine[], config: Partial<VibeConfig> = {}): VibeResult[] {
  return runVibePipeline(population, config).results;
}

// Highest VIBE first; ties fall back to playerId so output is reproducible
export function rankByVibe<T extends { playerId: number; vibe: number }>(rows: readonly T[]): T[] {
  return [...rows].sort((a, b) => b.vibe - a.vibe || a.playerId - b.playerId);
}
