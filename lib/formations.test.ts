import { describe, it, expect } from "vitest";
import { POSITIONS, getFormation, isFormationId, listFormations } from "./formations";
import { UnsupportedFormationError } from "./errors";

describe("formation catalog", () => {
  it("lists the seven supported formations", () => {
    expect(listFormations().map((f) => f.id)).toEqual([
      "3-4-3", "4-3-3", "3-5-2", "4-4-2", "5-3-2", "4-5-1", "5-4-1",
    ]);
  });

  it("fields eleven players with exactly one goalkeeper", () => {
    for (const f of listFormations()) {
      const total = POSITIONS.reduce((sum, pos) => sum + f[pos], 0);
      expect(total).toBe(11);
      expect(f.GK).toBe(1);
    }
  });

  it("matches outfield counts to the identifier", () => {
    for (const f of listFormations()) {
      expect(`${f.DEF}-${f.MID}-${f.FWD}`).toBe(f.id);
    }
  });

  it("looks up a formation by id", () => {
    expect(getFormation("5-4-1")).toEqual({ GK: 1, DEF: 5, MID: 4, FWD: 1 });
    expect(isFormationId("4-3-3")).toBe(true);
  });

  it("rejects unknown identifiers", () => {
    expect(isFormationId("4-2-4")).toBe(false);
    expect(isFormationId("toString")).toBe(false);
    expect(() => getFormation("4-2-4")).toThrow(UnsupportedFormationError);
    expect(() => getFormation("4-2-4")).toThrow('Unsupported formation "4-2-4"');
  });
});
