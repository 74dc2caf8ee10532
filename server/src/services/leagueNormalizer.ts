// server/src/services/leagueNormalizer.ts

import type { ScoredPlayer, VibeResult } from '../types.js';
import { mean, roundTo, standardDeviation } from './stats.js';

export const VIBE_CENTER = 100;
export const VIBE_SPREAD = 15;

export type VibeTier = 'MVP' | 'ALL_NBA' | 'STRONG_STARTER' | 'ABOVE_AVERAGE' | 'ROTATION' | 'BELOW_AVERAGE';

export const VIBE_TIERS: ReadonlyArray<{ tier: VibeTier; min: number; label: string }> = [
  { tier: 'MVP', min: 140, label: 'MVP-level' },
  { tier: 'ALL_NBA', min: 125, label: 'All-NBA' },
  { tier: 'STRONG_STARTER', min: 115, label: 'Strong starter' },
  { tier: 'ABOVE_AVERAGE', min: 100, label: 'Above average' },
  { tier: 'ROTATION', min: 90, label: 'Rotation player' },
  { tier: 'BELOW_AVERAGE', min: Number.NEGATIVE_INFINITY, label: 'Below-average impact' }
];

/**
 * Rescales the shrunk composites of a whole season onto the display scale
 * (mean 100, spread 15), rounded to one decimal. Only meaningful over the full
 * population that will be displayed.
 */
export function normalizeLeague(scored: readonly ScoredPlayer[]): VibeResult[] {
  if (scored.length === 0) return [];

  const shrunk = scored.map(s => s.vibeShrunk);
  const center = mean(shrunk);
  let spread = standardDeviation(shrunk);
  if (spread <= 0) spread = 1.0;

  return scored.map(s => ({
    ...s,
    vibe: roundTo(VIBE_CENTER + VIBE_SPREAD * (s.vibeShrunk - center) / spread, 1)
  }));
}

export function normalizeVibeScore(value: number, leagueMean = 0, leagueStd = 1): number {
  if (leagueStd <= 0) return VIBE_CENTER;
  return roundTo(VIBE_CENTER + VIBE_SPREAD * (value - leagueMean) / leagueStd, 1);
}

export function vibeTier(vibe: number): VibeTier {
  const match = VIBE_TIERS.find(t => vibe >= t.min);
  return match ? match.tier : 'BELOW_AVERAGE';
}
