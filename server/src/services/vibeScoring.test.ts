import { describe, expect, it } from 'vitest';
import { defensiveZ, impactZ, offensiveZ, scorePlayer, shrinkFactor } from './vibeScoring.js';
import { statLine } from '../testing/memorySeasonStats.js';
import type { ReferenceDistributions, StatDistribution } from '../types.js';

const unit: StatDistribution = { mean: 0, std: 1 };

const standardDistributions = (withWings = true): ReferenceDistributions => ({
  league: {
    trueShooting: unit,
    points100: unit,
    assists100: unit,
    offensiveRebounds100: unit,
    turnovers100: unit,
    plusMinus100: unit
  },
  byPosition: withWings
    ? { WING: { defensiveRebounds100: unit, steals100: unit, blocks100: unit, fouls100: unit } }
    : {},
  qualifiedCount: 10,
  usedFallbackPopulation: false
});

// 240 minutes = 100 possessions, so per-100 rates equal the raw totals
const wing = statLine({
  playerId: 9,
  gamesPlayed: 10,
  minutes: 240,
  points: 20,
  fieldGoalsAttempted: 10,
  assists: 5,
  offensiveRebounds: 2,
  defensiveRebounds: 3,
  turnovers: 3,
  steals: 1,
  blocks: 1,
  personalFouls: 2,
  plusMinus: 10
});

describe('offensiveZ', () => {
  it('applies the offensive weights to league z-scores', () => {
    // TS = 20 / (2 * 10) = 1.0
    // 1.8*1 + 1.2*20 + 1.3*5 + 0.8*2 - 1.4*3
    expect(offensiveZ(wing, standardDistributions())).toBeCloseTo(29.7, 10);
  });
});

describe('defensiveZ', () => {
  it('uses the position group distribution', () => {
    // 1.3*1 + 1.1*1 + 0.5*3 - 1.0*2
    expect(defensiveZ(wing, standardDistributions())).toBeCloseTo(1.9, 10);
  });

  it('contributes nothing when the group has no distribution', () => {
    expect(defensiveZ(wing, standardDistributions(false))).toBe(0);
  });

  it('is zero for a player matching a floored, deviation-free group', () => {
    const flat: StatDistribution = { mean: 1, std: 0.1 };
    const distributions: ReferenceDistributions = {
      ...standardDistributions(),
      byPosition: { WING: { defensiveRebounds100: { mean: 3, std: 0.1 }, steals100: flat, blocks100: flat, fouls100: { mean: 2, std: 0.1 } } }
    };

    expect(defensiveZ(wing, distributions)).toBe(0);
  });
});

describe('impactZ', () => {
  it('measures plus-minus per 100 against the league', () => {
    const distributions = standardDistributions();
    distributions.league.plusMinus100 = { mean: 2, std: 4 };

    expect(impactZ(wing, distributions)).toBe(2);
  });
});

describe('shrinkFactor', () => {
  it('halves the composite at 600 minutes', () => {
    expect(shrinkFactor(600)).toBe(0.5);
  });

  it('is strictly increasing in minutes', () => {
    const minutes = [0, 100, 200, 600, 1200, 2500, 3200];
    const factors = minutes.map(shrinkFactor);

    for (let i = 1; i < factors.length; i++) {
      expect(factors[i]).toBeGreaterThan(factors[i - 1]);
    }
    expect(factors[0]).toBe(0);
  });

  it('treats negative minutes as zero', () => {
    expect(shrinkFactor(-50)).toBe(0);
  });
});

describe('scorePlayer', () => {
  it('blends skill and impact then shrinks by minutes', () => {
    const result = scorePlayer(wing, standardDistributions());

    const skill = 0.6 * 29.7 + 0.4 * 1.9;
    const raw = 0.65 * skill + 0.35 * 10;

    expect(result.playerId).toBe(9);
    expect(result.positionGroup).toBe('WING');
    expect(result.ovibe).toBeCloseTo(29.7, 10);
    expect(result.dvibe).toBeCloseTo(1.9, 10);
    expect(result.impact).toBe(10);
    expect(result.skill).toBeCloseTo(skill, 10);
    expect(result.vibeRaw).toBeCloseTo(raw, 10);
    expect(result.shrinkFactor).toBeCloseTo(240 / 840, 12);
    expect(result.vibeShrunk).toBeCloseTo(raw * 240 / 840, 10);
    expect(result.minutes).toBe(240);
    expect(result).not.toHaveProperty('vibe');
  });

  it('scores a player with no minutes without throwing', () => {
    const result = scorePlayer(statLine({ playerId: 3, points: 4 }), standardDistributions());

    expect(Number.isFinite(result.vibeRaw)).toBe(true);
    expect(result.shrinkFactor).toBe(0);
    expect(result.vibeShrunk).toBe(0);
  });
});
