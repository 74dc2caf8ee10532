import { describe, expect, it } from 'vitest';
import { defensivePer100Rates, estimatePossessions, per100Rates, trueShooting } from './rates.js';
import { statLine } from '../testing/memorySeasonStats.js';

describe('estimatePossessions', () => {
  it('converts 240 minutes into 100 possessions', () => {
    expect(estimatePossessions(240)).toBe(100);
  });

  it('clamps zero and negative minutes to one possession', () => {
    expect(estimatePossessions(0)).toBe(1);
    expect(estimatePossessions(-12)).toBe(1);
  });
});

describe('per100Rates', () => {
  it('scales counting stats to a 100-possession basis', () => {
    const rates = per100Rates(statLine({ playerId: 1, minutes: 240, points: 20, assists: 7, plusMinus: -30 }));

    expect(rates.points100).toBe(20);
    expect(rates.assists100).toBe(7);
    expect(rates.plusMinus100).toBe(-30);
    expect(rates.steals100).toBe(0);
  });

  it('stays finite for a player with no minutes', () => {
    const rates = per100Rates(statLine({ playerId: 1, minutes: 0, points: 10 }));

    expect(rates.points100).toBe(1000);
    expect(Object.values(rates).every(Number.isFinite)).toBe(true);
  });
});

describe('defensivePer100Rates', () => {
  it('returns only the defensive subset', () => {
    const rates = defensivePer100Rates(statLine({
      playerId: 1, minutes: 480, defensiveRebounds: 10, steals: 4, blocks: 2, personalFouls: 6, points: 99
    }));

    expect(rates).toEqual({ defensiveRebounds100: 5, steals100: 2, blocks100: 1, fouls100: 3 });
  });
});

describe('trueShooting', () => {
  it('is zero without any shot attempts', () => {
    expect(trueShooting({ points: 0, fieldGoalsAttempted: 0, freeThrowsAttempted: 0 })).toBe(0);
    expect(trueShooting({ points: 4, fieldGoalsAttempted: 0, freeThrowsAttempted: 0 })).toBe(0);
  });

  it('weights free throw attempts at 0.44', () => {
    expect(trueShooting({ points: 20, fieldGoalsAttempted: 15, freeThrowsAttempted: 5 })).toBeCloseTo(20 / 34.4, 10);
  });
});
