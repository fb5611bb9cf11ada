import { Router, type Request, type Response } from 'express';
import type { ScoringConfig } from '../../lib/config';
import { listFormations } from '../../lib/formations';
import {
  createTeam,
  pointsToGoals,
  scoreTeam,
  type RandomSource,
  type Team,
} from '../../lib/scoring';
import {
  createTeamSchema,
  goalsRequestSchema,
  scoreRequestSchema,
  type RegisteredTeam,
} from './models';

export type RouterOptions = {
  config: ScoringConfig;
  random?: RandomSource;
};

export function createRouter({ config, random }: RouterOptions) {
  const router = Router();

  // In-memory team registry. Each app instance gets its own.
  const registry = new Map<number, { record: RegisteredTeam; team: Team }>();
  let nextTeamId = 1;

  // GET /api/formations - supported formations with slot counts
  router.get('/formations', (_req: Request, res: Response) => {
    res.json(listFormations());
  });

  // POST /api/teams - validate and register a team
  router.post('/teams', (req: Request, res: Response) => {
    const input = createTeamSchema.parse(req.body);

    // throws on unknown formation / wrong roster shape; handled by the app error handler
    const team = createTeam({
      formation: input.formation,
      players: input.players,
      bench: input.bench,
    });

    const id = nextTeamId++;
    const record: RegisteredTeam = {
      id,
      name: input.name ?? `Team ${id}`,
      formation: team.formation,
      players: input.players,
      bench: input.bench,
    };
    registry.set(id, { record, team });
    res.status(201).json(record);
  });

  // GET /api/teams - all registered teams
  router.get('/teams', (_req: Request, res: Response) => {
    res.json(Array.from(registry.values(), (e) => e.record));
  });

  // GET /api/teams/:id
  router.get('/teams/:id', (req: Request, res: Response) => {
    const entry = registry.get(Number(req.params.id));
    if (!entry) {
      res.status(404).json({ error: 'Team not found' });
      return;
    }
    res.json(entry.record);
  });

  // POST /api/teams/:id/score - score a team against a fixture's player stats
  router.post('/teams/:id/score', (req: Request, res: Response) => {
    const entry = registry.get(Number(req.params.id));
    if (!entry) {
      res.status(404).json({ error: 'Team not found' });
      return;
    }

    const { players, isAway } = scoreRequestSchema.parse(req.body);
    const result = scoreTeam({ team: entry.team, stats: players, isAway, config, random });

    res.json({
      teamId: entry.record.id,
      total: result.total,
      goals: pointsToGoals(result.total, config),
      captainId: result.captainId,
      substitutions: result.substitutions,
      lineup: result.lineup,
    });
  });

  // POST /api/goals - convert a point total to goals
  router.post('/goals', (req: Request, res: Response) => {
    const { points } = goalsRequestSchema.parse(req.body);
    res.json({ points, goals: pointsToGoals(points, config) });
  });

  return router;
}
