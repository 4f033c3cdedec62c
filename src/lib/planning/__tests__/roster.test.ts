import { describe, it, expect } from "vitest";
import { rosterFor, DEFAULT_ROLE_WEIGHTS } from "../roster.js";
import { ConfigurationError } from "../../../errors.js";
import type { WorkUnit, WorkerAssignment } from "../../../types.js";

const weightOf = (roster: WorkerAssignment[]) => roster.reduce((sum, a) => sum + a.voteWeight, 0);

const unit = (isOversized: boolean): WorkUnit => ({
  id: "u1",
  label: "u1",
  resourcePatterns: ["src/**"],
  estimatedSize: 10,
  isOversized,
});

describe("rosterFor", () => {
  it("assigns the three baseline roles in order", () => {
    const roster = rosterFor(unit(false));
    expect(roster.map((a) => [a.role, a.voteWeight])).toEqual([
      ["quality", 1.0],
      ["implementation", 1.0],
      ["design", 1.2],
    ]);
    expect(weightOf(roster)).toBeCloseTo(3.2);
  });

  it("adds complexity only for oversized units", () => {
    const roster = rosterFor(unit(true));
    expect(roster).toHaveLength(4);
    expect(roster[3]).toEqual({
      workUnitId: "u1",
      role: "complexity",
      voteWeight: 1.5,
      appliesOnlyIfOversized: true,
    });
    expect(weightOf(roster)).toBeCloseTo(4.7);
  });

  it("uses configured weights", () => {
    const roster = rosterFor(unit(false), { ...DEFAULT_ROLE_WEIGHTS, design: 2 });
    expect(roster[2].voteWeight).toBe(2);
  });

  it("rejects non-positive or non-finite weights", () => {
    expect(() => rosterFor(unit(false), { ...DEFAULT_ROLE_WEIGHTS, quality: 0 })).toThrow(ConfigurationError);
    expect(() =>
      rosterFor(unit(false), { ...DEFAULT_ROLE_WEIGHTS, complexity: Number.POSITIVE_INFINITY })
    ).toThrow(/complexity: Infinity/);
  });
});
