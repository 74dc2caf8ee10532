import { describe, expect, it } from 'vitest';
import { buildReferenceDistributions, selectQualified } from './referenceDistributions.js';
import { statLine } from '../testing/memorySeasonStats.js';
import { samplePopulation } from '../testing/fixtures.js';

// Identical wings: 1 rebound and no assists per game
const twinWing = (playerId: number) => statLine({
  playerId, gamesPlayed: 10, minutes: 480, defensiveRebounds: 10, steals: 4, blocks: 2, personalFouls: 6
});

describe('selectQualified', () => {
  it('keeps players at or above the minutes threshold', () => {
    const population = [
      statLine({ playerId: 1, minutes: 199 }),
      statLine({ playerId: 2, minutes: 200 }),
      statLine({ playerId: 3, minutes: 900 })
    ];

    const { players, usedFallback } = selectQualified(population, 200);

    expect(players.map(p => p.playerId)).toEqual([2, 3]);
    expect(usedFallback).toBe(false);
  });

  it('falls back to everyone when nobody qualifies', () => {
    const population = [statLine({ playerId: 1, minutes: 50 }), statLine({ playerId: 2, minutes: 120 })];

    const { players, usedFallback } = selectQualified(population, 200);

    expect(players).toHaveLength(2);
    expect(usedFallback).toBe(true);
  });
});

describe('buildReferenceDistributions', () => {
  it('computes population mean and standard deviation for league stats', () => {
    const distributions = buildReferenceDistributions([
      statLine({ playerId: 1, minutes: 240, points: 10 }),
      statLine({ playerId: 2, minutes: 240, points: 30 })
    ]);

    expect(distributions.league.points100).toEqual({ mean: 20, std: 10 });
    expect(distributions.qualifiedCount).toBe(2);
  });

  it('replaces a zero league-wide spread with 1.0', () => {
    const distributions = buildReferenceDistributions([twinWing(1), twinWing(2), twinWing(3)]);

    expect(distributions.league.points100).toEqual({ mean: 0, std: 1 });
    expect(distributions.league.trueShooting).toEqual({ mean: 0, std: 1 });
  });

  it('floors a narrow league-wide spread at 1.0', () => {
    const shooter = (playerId: number, fieldGoalsAttempted: number) =>
      statLine({ playerId, gamesPlayed: 20, minutes: 600, points: 500, fieldGoalsAttempted });

    const distributions = buildReferenceDistributions([shooter(1, 400), shooter(2, 450), shooter(3, 500)]);
    const { trueShooting } = distributions.league;

    expect(trueShooting.mean).toBeCloseTo((500 / 800 + 500 / 900 + 500 / 1000) / 3, 12);
    expect(trueShooting.std).toBe(1);
  });

  it('keeps a league-wide spread above 1.0 as computed', () => {
    const distributions = buildReferenceDistributions([
      statLine({ playerId: 1, minutes: 240, assists: 4 }),
      statLine({ playerId: 2, minutes: 240, assists: 7 })
    ]);

    expect(distributions.league.assists100).toEqual({ mean: 5.5, std: 1.5 });
    expect(distributions.league.turnovers100).toEqual({ mean: 0, std: 1 });
  });

  it('floors position-group spread at 0.1 for identical defenders', () => {
    const distributions = buildReferenceDistributions([twinWing(1), twinWing(2), twinWing(3)]);

    expect(distributions.byPosition.WING).toEqual({
      defensiveRebounds100: { mean: 5, std: 0.1 },
      steals100: { mean: 2, std: 0.1 },
      blocks100: { mean: 1, std: 0.1 },
      fouls100: { mean: 3, std: 0.1 }
    });
  });

  it('skips position groups with fewer than three qualified players', () => {
    const big = (playerId: number) => statLine({ playerId, gamesPlayed: 10, minutes: 600, defensiveRebounds: 90 });

    const distributions = buildReferenceDistributions([twinWing(1), twinWing(2), twinWing(3), big(4), big(5)]);

    expect(distributions.byPosition.WING).toBeDefined();
    expect(distributions.byPosition.BIG).toBeUndefined();
    expect(distributions.byPosition.GUARD).toBeUndefined();
  });

  it('ignores unqualified players when qualified ones exist', () => {
    const distributions = buildReferenceDistributions([
      statLine({ playerId: 1, minutes: 240, points: 10 }),
      statLine({ playerId: 2, minutes: 240, points: 30 }),
      statLine({ playerId: 3, minutes: 24, points: 50 })
    ]);

    expect(distributions.qualifiedCount).toBe(2);
    expect(distributions.league.points100.mean).toBe(20);
  });

  it('honours a custom minutes threshold', () => {
    const distributions = buildReferenceDistributions(samplePopulation(30), { minMinutes: 1000 });
    const expected = samplePopulation(30).filter(p => p.minutes >= 1000).length;

    expect(distributions.qualifiedCount).toBe(expected);
    expect(distributions.usedFallbackPopulation).toBe(false);
  });

  it('still produces finite distributions when everyone is under the threshold', () => {
    const distributions = buildReferenceDistributions([
      statLine({ playerId: 1, gamesPlayed: 5, minutes: 50, points: 20, fieldGoalsAttempted: 15 }),
      statLine({ playerId: 2, gamesPlayed: 8, minutes: 120, points: 45, fieldGoalsAttempted: 40 }),
      statLine({ playerId: 3, gamesPlayed: 9, minutes: 150, points: 30, fieldGoalsAttempted: 30 })
    ]);

    expect(distributions.usedFallbackPopulation).toBe(true);
    expect(distributions.qualifiedCount).toBe(3);
    for (const dist of Object.values(distributions.league)) {
      expect(Number.isFinite(dist.mean)).toBe(true);
      expect(dist.std).toBeGreaterThan(0);
    }
  });

  it('handles an empty population', () => {
    const distributions = buildReferenceDistributions([]);

    expect(distributions.qualifiedCount).toBe(0);
    expect(distributions.league.plusMinus100).toEqual({ mean: 0, std: 1 });
    expect(distributions.byPosition).toEqual({});
  });
});
