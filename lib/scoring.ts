// lib/scoring.ts
import { resolveConfig, type ScoringConfig } from "./config";
import { DuplicatePlayerError, InvalidRosterError, UnsupportedFormationError } from "./errors";
import {
  POSITIONS,
  getFormation,
  isFormationId,
  type Formation,
  type FormationId,
  type Position,
} from "./formations";
import { createLogger } from "./logger";

export type { Position };

export type RosterPlayer = { id: string; position: Position; captain?: boolean };

export type PlayerStats = { id: string; position: Position; points: number };

export type ScoredPlayer = PlayerStats & { captain: boolean };

export type Team = {
  readonly formation: FormationId;
  readonly lineup: Formation;
  readonly players: readonly RosterPlayer[]; // starting XI, roster order
  readonly bench: readonly RosterPlayer[]; // substitution priority order
};

export type Substitution = { outId: string; inId: string; position: Position };

export type TeamScore = {
  total: number;
  captainId: string;
  substitutions: Substitution[];
  lineup: ScoredPlayer[];
};

/** Returns a value in [0, 1). */
export type RandomSource = () => number;

export type ScoreOptions = {
  config?: Partial<ScoringConfig>;
  random?: RandomSource;
};

const HOME_BONUS = 6;
const CAPTAIN_MULTIPLIER = 2;

const log = createLogger("scoring");

type Counts = Record<Position, number>;
function emptyCounts(): Counts {
  return { GK: 0, DEF: 0, MID: 0, FWD: 0 };
}

function assertUniqueIds(players: readonly RosterPlayer[]) {
  const seen = new Set<string>();
  for (const p of players) {
    if (seen.has(p.id)) throw new DuplicatePlayerError(p.id);
    seen.add(p.id);
  }
}

/**
 * Validates the starting XI against the formation and freezes the team.
 * Throws UnsupportedFormationError, InvalidRosterError or DuplicatePlayerError.
 */
export function createTeam(args: {
  formation: string;
  players: readonly RosterPlayer[];
  bench?: readonly RosterPlayer[];
}): Team {
  const { formation } = args;
  if (!isFormationId(formation)) throw new UnsupportedFormationError(formation);
  const lineup = getFormation(formation);

  const players = args.players.map((p) => Object.freeze({ ...p }));
  const bench = (args.bench ?? []).map((p) => Object.freeze({ ...p }));

  const counts = emptyCounts();
  for (const p of players) counts[p.position] += 1;

  for (const pos of POSITIONS) {
    if (counts[pos] !== lineup[pos]) {
      throw new InvalidRosterError(pos, counts[pos], formation);
    }
  }

  assertUniqueIds([...players, ...bench]);

  return Object.freeze({
    formation,
    lineup,
    players: Object.freeze(players),
    bench: Object.freeze(bench),
  });
}

/**
 * First flagged captain in roster order. Without one, a random starter is
 * picked, so repeated calls may disagree unless `random` is seeded.
 */
export function resolveCaptain(
  players: readonly RosterPlayer[],
  random: RandomSource = Math.random
): string {
  const flagged = players.find((p) => p.captain);
  if (flagged) return flagged.id;
  if (players.length === 0) throw new RangeError("Cannot pick a captain from an empty roster");

  log.warn("Captain not provided, picking a random one");
  const idx = Math.min(players.length - 1, Math.floor(random() * players.length));
  return players[idx].id;
}

/** Round-half-to-even at `decimals` places. */
export function roundHalfEven(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;

  return rounded / factor;
}

function indexStats(stats: readonly PlayerStats[]): Map<string, PlayerStats> {
  const byId = new Map<string, PlayerStats>();
  for (const s of stats) {
    if (!byId.has(s.id)) byId.set(s.id, s);
  }
  return byId;
}

/**
 * Scores a team for one fixture.
 * - Starters without stats are left out of the count
 * - Zero-point starters are replaced, in roster order, by the first unused
 *   bench player of the same position who scored (bench order)
 * - Only successful substitutions count toward `maxSubstitutions`
 * - A substituted captain hands the armband to the substitute
 */
export function scoreTeam(args: {
  team: Team;
  stats: readonly PlayerStats[];
  isAway: boolean;
} & ScoreOptions): TeamScore {
  const { team, stats, isAway } = args;
  const { maxSubstitutions } = resolveConfig(args.config);

  const statsById = indexStats(stats);
  const captainId = resolveCaptain(team.players, args.random);

  // --- starters with stats ---
  const playing: ScoredPlayer[] = [];
  for (const p of team.players) {
    const s = statsById.get(p.id);
    if (!s) continue;
    playing.push({ id: s.id, position: s.position, points: s.points, captain: s.id === captainId });
  }
  log.debug("Playing players", playing);

  // --- bench players who scored, in bench order ---
  const eligible: PlayerStats[] = [];
  for (const b of team.bench) {
    const s = statsById.get(b.id);
    if (s && s.points > 0) eligible.push(s);
  }
  log.debug("Eligible substitutes", eligible);

  const substitutions: Substitution[] = [];
  let captainSubstituteId: string | null = null;

  if (eligible.length > 0) {
    const usedSubs = new Set<string>();
    const candidates = playing.filter((p) => p.points === 0);

    for (const candidate of candidates) {
      // a limit of 0 allows no substitutions at all
      if (substitutions.length >= maxSubstitutions) break;

      const sub = eligible.find((s) => s.position === candidate.position && !usedSubs.has(s.id));
      if (!sub) continue;

      usedSubs.add(sub.id);
      substitutions.push({ outId: candidate.id, inId: sub.id, position: candidate.position });
      log.debug(`Substituting ${candidate.id} with ${sub.id}`);

      if (candidate.captain) {
        log.warn("Substitution of the captain");
        captainSubstituteId = sub.id;
      }

      if (substitutions.length >= maxSubstitutions) {
        log.info("Reached maximum substitutions limit");
        break;
      }
    }
  }

  // --- final line-up ---
  const outIds = new Set(substitutions.map((s) => s.outId));
  const inIds = new Set(substitutions.map((s) => s.inId));

  let lineup: ScoredPlayer[] = [
    ...playing.filter((p) => !outIds.has(p.id)),
    ...eligible.filter((s) => inIds.has(s.id)).map((s) => ({ ...s, captain: false })),
  ];
  if (captainSubstituteId !== null) {
    const newCaptain = captainSubstituteId;
    lineup = lineup.map((p) => ({ ...p, captain: p.id === newCaptain }));
  }

  let total = isAway ? 0 : HOME_BONUS;
  for (const p of lineup) {
    total += p.captain ? p.points * CAPTAIN_MULTIPLIER : p.points;
  }

  return {
    total: roundHalfEven(total, 2),
    captainId: captainSubstituteId ?? captainId,
    substitutions,
    lineup,
  };
}

export function teamPoints(
  team: Team,
  stats: readonly PlayerStats[],
  isAway: boolean,
  options: ScoreOptions = {}
): number {
  return scoreTeam({ team, stats, isAway, ...options }).total;
}

/**
 * Goal-equivalent of a point total: one goal for every step of the ladder
 * `goalThreshold, goalThreshold + goalGap, ...` the points strictly exceed.
 */
export function pointsToGoals(points: number, config?: Partial<ScoringConfig>): number {
  if (!Number.isFinite(points)) throw new RangeError(`points must be finite, got ${points}`);
  const { goalThreshold, goalGap } = resolveConfig(config);
  if (!(goalGap > 0)) throw new RangeError(`goalGap must be positive, got ${goalGap}`);

  if (points <= goalThreshold) return 0;
  return Math.ceil((points - goalThreshold) / goalGap);
}
