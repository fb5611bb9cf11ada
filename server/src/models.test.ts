import { describe, it, expect } from 'vitest';
import { createTeamSchema, mapPosition, playerStatsSchema } from './models';

describe('mapPosition', () => {
  it('maps short codes and full names', () => {
    expect(mapPosition('GK')).toBe('GK');
    expect(mapPosition('Goalkeeper')).toBe('GK');
    expect(mapPosition('Defender')).toBe('DEF');
    expect(mapPosition('Centre-Back')).toBe('DEF');
    expect(mapPosition(' midfielder ')).toBe('MID');
    expect(mapPosition('Forward')).toBe('FWD');
    expect(mapPosition('Striker')).toBe('FWD');
  });

  it('treats defensive midfielders as midfielders', () => {
    expect(mapPosition('Defensive Midfielder')).toBe('MID');
  });

  it('maps wingers to forwards and wing-backs to defenders', () => {
    expect(mapPosition('Left Winger')).toBe('FWD');
    expect(mapPosition('Right Wing')).toBe('FWD');
    expect(mapPosition('Left Wing-Back')).toBe('DEF');
  });

  it('returns null for unknown positions', () => {
    expect(mapPosition('Coach')).toBeNull();
  });
});

describe('payload schemas', () => {
  it('normalises ids and positions of player stats', () => {
    expect(playerStatsSchema.parse({ id: 42, position: 'Forward', points: 7.5 })).toEqual({
      id: '42',
      position: 'FWD',
      points: 7.5,
    });
  });

  it('rejects an unknown position', () => {
    const result = playerStatsSchema.safeParse({ id: 'p1', position: 'Coach', points: 1 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe('Unknown position "Coach"');
  });

  it('defaults the bench to empty', () => {
    const parsed = createTeamSchema.parse({
      formation: '4-4-2',
      players: [{ id: 'gk1', position: 'GK', captain: true }],
    });

    expect(parsed.bench).toEqual([]);
    expect(parsed.name).toBeUndefined();
  });
});
