/**
 * Zod schemas for stat lines entering the server
 *
 * Everything that reaches the scoring pipeline passes through here once: request
 * bodies and CSV rows alike. Missing or null totals default to 0.
 */
import { z, type ZodError } from 'zod';
import type { PlayerStatLine } from '../types.js';

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Season label, e.g. 2024-25 */
export const SeasonSchema = z.string().regex(/^\d{4}-\d{2}$/, 'Season must look like 2024-25');

/** Stat total: number or numeric string; null, missing and blank become 0 */
const statTotal = z
  .union([z.number(), z.string(), z.null(), z.undefined()])
  .transform((val, ctx) => {
    if (val === null || val === undefined) return 0;
    if (typeof val === 'string' && val.trim() === '') return 0;
    const parsed = typeof val === 'number' ? val : Number(val);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a finite number' });
      return z.NEVER;
    }
    return parsed;
  });

const optionalText = z
  .string()
  .nullish()
  .transform(val => (val && val.trim() !== '' ? val.trim() : undefined));

// =============================================================================
// PLAYER STAT LINE
// =============================================================================

export const PlayerStatLineInputSchema = z.object({
  playerId: z.coerce.number().int().positive(),
  playerName: optionalText,
  teamAbbreviation: optionalText,
  gamesPlayed: statTotal,
  minutes: statTotal,
  points: statTotal,
  assists: statTotal,
  offensiveRebounds: statTotal,
  defensiveRebounds: statTotal,
  fieldGoalsMade: statTotal,
  fieldGoalsAttempted: statTotal,
  threePointersMade: statTotal,
  threePointersAttempted: statTotal,
  freeThrowsMade: statTotal,
  freeThrowsAttempted: statTotal,
  turnovers: statTotal,
  steals: statTotal,
  blocks: statTotal,
  personalFouls: statTotal,
  plusMinus: statTotal,
});

export type PlayerStatLineInput = z.input<typeof PlayerStatLineInputSchema>;

/** Parses and defaults a single stat line; throws ZodError on malformed input */
export function normalizeStatLine(input: PlayerStatLineInput): PlayerStatLine {
  return PlayerStatLineInputSchema.parse(input);
}

// =============================================================================
// TEAM STAT LINE
// =============================================================================

/** Nullable rate: blank or missing stays null instead of defaulting */
const optionalRate = z
  .union([z.number(), z.string(), z.null(), z.undefined()])
  .transform(val => {
    if (val === null || val === undefined) return null;
    if (typeof val === 'string' && val.trim() === '') return null;
    const parsed = Number(val);
    return Number.isFinite(parsed) ? parsed : null;
  });

export const TeamStatLineInputSchema = z.object({
  teamId: z.coerce.number().int().positive(),
  teamName: z.string().trim().min(1),
  teamAbbreviation: z.string().trim().default(''),
  gamesPlayed: statTotal,
  wins: statTotal,
  losses: statTotal,
  points: statTotal,
  opponentPoints: optionalRate,
  fieldGoalsMade: statTotal,
  fieldGoalsAttempted: statTotal,
  freeThrowsAttempted: statTotal,
  turnovers: statTotal,
  rebounds: statTotal,
  assists: statTotal,
  fieldGoalPct: optionalRate,
  threePointPct: optionalRate,
});

// =============================================================================
// REQUEST BODIES
// =============================================================================

export const VibeRequestSchema = z.object({
  players: z.array(PlayerStatLineInputSchema).min(1, 'At least one player is required'),
  minMinutes: z.number().min(0).optional(),
});

export type VibeRequest = z.output<typeof VibeRequestSchema>;

export const InvalidateRequestSchema = z.object({
  season: SeasonSchema.optional(),
});

// =============================================================================
// HELPERS
// =============================================================================

export function formatValidationError(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
