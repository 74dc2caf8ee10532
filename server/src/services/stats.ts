// server/src/services/stats.ts

import type { StatDistribution } from '../types.js';

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

// Population standard deviation (divides by n, not n - 1)
export function standardDeviation(values: number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  const squaredDiffs = values.map(val => Math.pow(val - avg, 2));
  const variance = squaredDiffs.reduce((sum, val) => sum + val, 0) / values.length;
  return Math.sqrt(variance);
}

export function distributionOf(values: number[], floor: (std: number) => number): StatDistribution {
  return { mean: mean(values), std: floor(standardDeviation(values)) };
}

export function zScore(value: number, dist: StatDistribution): number {
  return (value - dist.mean) / dist.std;
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
