// server/src/services/methodology.ts

import { VIBE_TIERS, type VibeTier } from './leagueNormalizer.js';
import {
  DEFENSE_WEIGHTS, OFFENSE_WEIGHTS, RAW_IMPACT_WEIGHT, RAW_SKILL_WEIGHT,
  SHRINKAGE_MINUTES, SKILL_DEFENSE_WEIGHT, SKILL_OFFENSE_WEIGHT
} from './vibeScoring.js';

export function getVibeMethodology(): {
  title: string;
  description: string;
  formula: string[];
  components: Array<{
    name: string;
    description: string;
    weight: string;
  }>;
  tiers: Array<{ tier: VibeTier; label: string; min: number | null }>;
} {
  return {
    title: 'VIBE - Valued Impact Basketball Estimate',
    description: 'Per-100-possession composite of offense, position-relative defense and on-court impact, shrunk toward average for low-minute players and rescaled so the league averages 100 with a spread of 15.',

    formula: [
      'PlayerPoss = MIN × 100 / 240',
      `OVIBE = ${OFFENSE_WEIGHTS.trueShooting}·zTS + ${OFFENSE_WEIGHTS.points100}·zPTS100 + ${OFFENSE_WEIGHTS.assists100}·zAST100 + ${OFFENSE_WEIGHTS.offensiveRebounds100}·zORB100 − ${Math.abs(OFFENSE_WEIGHTS.turnovers100)}·zTOV100`,
      `DVIBE = ${DEFENSE_WEIGHTS.steals100}·zSTL100 + ${DEFENSE_WEIGHTS.blocks100}·zBLK100 + ${DEFENSE_WEIGHTS.defensiveRebounds100}·zDRB100 − ${Math.abs(DEFENSE_WEIGHTS.fouls100)}·zPF100 (within position group)`,
      `Skill = ${SKILL_OFFENSE_WEIGHT}·OVIBE + ${SKILL_DEFENSE_WEIGHT}·DVIBE`,
      `VIBE_raw = ${RAW_SKILL_WEIGHT}·Skill + ${RAW_IMPACT_WEIGHT}·Impact`,
      `VIBE_shrunk = VIBE_raw × MIN / (MIN + ${SHRINKAGE_MINUTES})`,
      'VIBE = 100 + 15 × (VIBE_shrunk − league mean) / league std'
    ],

    components: [
      {
        name: 'OVIBE',
        description: 'True shooting, scoring, playmaking and offensive rebounding against league averages, less turnovers',
        weight: `${Math.round(SKILL_OFFENSE_WEIGHT * RAW_SKILL_WEIGHT * 100)}%`
      },
      {
        name: 'DVIBE',
        description: 'Steals, blocks and defensive rebounding against guards, wings or bigs, less fouls',
        weight: `${Math.round(SKILL_DEFENSE_WEIGHT * RAW_SKILL_WEIGHT * 100)}%`
      },
      {
        name: 'Impact',
        description: 'Plus-minus per 100 possessions against league average',
        weight: `${Math.round(RAW_IMPACT_WEIGHT * 100)}%`
      },
      {
        name: 'Minutes shrinkage',
        description: `Half weight at ${SHRINKAGE_MINUTES} minutes, approaching full weight for heavy-minute players`,
        weight: 'Multiplier'
      }
    ],

    tiers: VIBE_TIERS.map(({ tier, label, min }) => ({
      tier,
      label,
      min: Number.isFinite(min) ? min : null
    }))
  };
}
