// lib/errors.ts
import type { Position } from "./formations";

export class ScoringError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedFormationError extends ScoringError {
  readonly formation: string;

  constructor(formation: string) {
    super(`Unsupported formation "${formation}"`);
    this.formation = formation;
  }
}

export class InvalidRosterError extends ScoringError {
  readonly position: Position;
  readonly count: number;
  readonly formation: string;

  constructor(position: Position, count: number, formation: string) {
    super(`${count} ${position}(s) not compatible with ${formation}`);
    this.position = position;
    this.count = count;
    this.formation = formation;
  }
}

/** Same player id listed twice across starting XI and bench. */
export class DuplicatePlayerError extends ScoringError {
  readonly playerId: string;

  constructor(playerId: string) {
    super(`Player ${playerId} is listed more than once in the team`);
    this.playerId = playerId;
  }
}

export class ConfigError extends ScoringError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scoring config: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
