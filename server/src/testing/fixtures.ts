// server/src/testing/fixtures.ts

import type { PlayerStatLine } from '../types.js';
import { statLine } from './memorySeasonStats.js';

// Heavy-minute playmaker: efficient, few turnovers, strong plus-minus
export const starGuard: PlayerStatLine = statLine({
  playerId: 1,
  playerName: 'Test Guard',
  teamAbbreviation: 'AAA',
  gamesPlayed: 70,
  minutes: 2000,
  points: 1800,
  assists: 500,
  offensiveRebounds: 60,
  defensiveRebounds: 250,
  fieldGoalsMade: 650,
  fieldGoalsAttempted: 1300,
  freeThrowsMade: 350,
  freeThrowsAttempted: 400,
  turnovers: 100,
  steals: 90,
  blocks: 20,
  personalFouls: 120,
  plusMinus: 400
});

// Bench wing right at the qualifying minutes line
export const benchWing: PlayerStatLine = statLine({
  playerId: 2,
  playerName: 'Test Wing',
  teamAbbreviation: 'BBB',
  gamesPlayed: 20,
  minutes: 200,
  points: 80,
  assists: 20,
  offensiveRebounds: 5,
  defensiveRebounds: 25,
  fieldGoalsMade: 30,
  fieldGoalsAttempted: 70,
  freeThrowsMade: 12,
  freeThrowsAttempted: 15,
  turnovers: 15,
  steals: 6,
  blocks: 2,
  personalFouls: 20,
  plusMinus: -10
});

/** Deterministic varied population for distribution-level assertions. */
export function samplePopulation(size: number): PlayerStatLine[] {
  return Array.from({ length: size }, (_, i) => {
    const n = i + 1;
    const gamesPlayed = 20 + (n * 7) % 60;
    return statLine({
      playerId: 100 + n,
      gamesPlayed,
      minutes: 150 + (n * 173) % 2400,
      points: 50 + (n * 97) % 1600,
      assists: 10 + (n * 41) % 450,
      offensiveRebounds: 5 + (n * 13) % 200,
      defensiveRebounds: 20 + (n * 59) % 550,
      fieldGoalsMade: 20 + (n * 37) % 600,
      fieldGoalsAttempted: 60 + (n * 71) % 1200,
      freeThrowsMade: 5 + (n * 19) % 300,
      freeThrowsAttempted: 10 + (n * 23) % 360,
      turnovers: 5 + (n * 17) % 220,
      steals: 2 + (n * 11) % 110,
      blocks: 1 + (n * 7) % 120,
      personalFouls: 10 + (n * 29) % 230,
      plusMinus: ((n * 83) % 500) - 250
    });
  });
}
