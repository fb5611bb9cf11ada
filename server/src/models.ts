import { z } from 'zod';
import type { Position } from '../../lib/formations';

// Accepts both short codes ("GK") and full names ("Goalkeeper") coming from stat feeds.
export function mapPosition(raw: string): Position | null {
  const r = raw.trim().toLowerCase();
  if (r === 'gk' || r.includes('goal')) return 'GK';
  // before the defender check: "Defensive Midfielder" is a midfielder
  if (r === 'mid' || r.includes('midfield')) return 'MID';
  if (r === 'def' || r.includes('defender') || r.includes('back')) return 'DEF';
  if (r === 'fwd' || r.includes('forward') || r.includes('striker') || r.includes('wing')) return 'FWD';
  return null;
}

const positionSchema = z.string().transform((raw, ctx): Position => {
  const pos = mapPosition(raw);
  if (!pos) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown position "${raw}"` });
    return z.NEVER;
  }
  return pos;
});

// ids may arrive as numbers from older clients
const playerIdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const rosterPlayerSchema = z.object({
  id: playerIdSchema,
  position: positionSchema,
  captain: z.boolean().optional(),
});

export const playerStatsSchema = z.object({
  id: playerIdSchema,
  position: positionSchema,
  points: z.number().finite(),
});

export const createTeamSchema = z.object({
  name: z.string().trim().min(1).optional(),
  formation: z.string(),
  players: z.array(rosterPlayerSchema),
  bench: z.array(rosterPlayerSchema).default([]),
});

export const scoreRequestSchema = z.object({
  players: z.array(playerStatsSchema),
  isAway: z.boolean(),
});

export const goalsRequestSchema = z.object({
  points: z.number().finite(),
});

export type CreateTeamInput = z.infer<typeof createTeamSchema>;
export type ScoreRequest = z.infer<typeof scoreRequestSchema>;

// A fantasy manager's registered team. Kept in memory for the lifetime of the app.
export interface RegisteredTeam {
  id: number;
  name: string;
  formation: string;
  players: CreateTeamInput['players'];
  bench: CreateTeamInput['bench'];
}
