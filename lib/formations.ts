// lib/formations.ts
import { UnsupportedFormationError } from "./errors";

export type Position = "GK" | "DEF" | "MID" | "FWD";

export const POSITIONS: readonly Position[] = ["GK", "DEF", "MID", "FWD"];

export type Formation = Readonly<Record<Position, number>>;

const FORMATIONS = {
  "3-4-3": { GK: 1, DEF: 3, MID: 4, FWD: 3 },
  "4-3-3": { GK: 1, DEF: 4, MID: 3, FWD: 3 },
  "3-5-2": { GK: 1, DEF: 3, MID: 5, FWD: 2 },
  "4-4-2": { GK: 1, DEF: 4, MID: 4, FWD: 2 },
  "5-3-2": { GK: 1, DEF: 5, MID: 3, FWD: 2 },
  "4-5-1": { GK: 1, DEF: 4, MID: 5, FWD: 1 },
  "5-4-1": { GK: 1, DEF: 5, MID: 4, FWD: 1 },
} as const satisfies Record<string, Formation>;

export type FormationId = keyof typeof FORMATIONS;

export function isFormationId(id: string): id is FormationId {
  return Object.prototype.hasOwnProperty.call(FORMATIONS, id);
}

export function getFormation(id: string): Formation {
  if (!isFormationId(id)) throw new UnsupportedFormationError(id);
  return FORMATIONS[id];
}

export function listFormations(): Array<{ id: FormationId } & Formation> {
  return Object.keys(FORMATIONS)
    .filter(isFormationId)
    .map((id) => ({ id, ...FORMATIONS[id] }));
}
