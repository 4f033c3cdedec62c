/**
 * Worker roster: which roles review a work unit and how much each vote weighs.
 * Baseline roles always run; complexity joins only for oversized units.
 */

import { ConfigurationError } from "../../errors.js";
import type { RoleWeights } from "../schemas/sweep.js";
import { BASELINE_ROLES, type WorkUnit, type WorkerAssignment } from "../../types.js";

export const DEFAULT_ROLE_WEIGHTS: RoleWeights = {
  quality: 1.0,
  implementation: 1.0,
  design: 1.2,
  complexity: 1.5,
};

export function validateRoleWeights(weights: RoleWeights): void {
  const bad = Object.entries(weights).filter(
    ([, w]) => !Number.isFinite(w) || w <= 0
  );
  if (bad.length > 0) {
    throw new ConfigurationError(
      "Role weights must be finite and > 0",
      bad.map(([role, w]) => `${role}: ${w}`)
    );
  }
}

export function rosterFor(unit: WorkUnit, weights: RoleWeights = DEFAULT_ROLE_WEIGHTS): WorkerAssignment[] {
  validateRoleWeights(weights);
  const roster: WorkerAssignment[] = BASELINE_ROLES.map((role) => ({
    workUnitId: unit.id,
    role,
    voteWeight: weights[role],
    appliesOnlyIfOversized: false,
  }));
  if (unit.isOversized) {
    roster.push({
      workUnitId: unit.id,
      role: "complexity",
      voteWeight: weights.complexity,
      appliesOnlyIfOversized: true,
    });
  }
  return roster;
}
