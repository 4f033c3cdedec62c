import type {
  Invocation,
  InvocationStatus,
  ParsedOutput,
  RawFinding,
  Role,
  WorkUnit,
  WorkerAssignment,
} from "../../../types.js";
import { DEFAULT_ROLE_WEIGHTS, rosterFor } from "../../planning/roster.js";

export const THRESHOLDS = { Critical: 100, High: 60, Medium: 60, Low: 50, Info: 40 };

export function makeUnit(id: string, isOversized = false): WorkUnit {
  return { id, label: id, resourcePatterns: [`${id}/**`], estimatedSize: 10, isOversized };
}

export function makeRoster(unit: WorkUnit): WorkerAssignment[] {
  return rosterFor(unit, DEFAULT_ROLE_WEIGHTS);
}

export function finding(severity: RawFinding["severity"], location: string, description: string): RawFinding {
  return { severity, location, description, recommendation: "" };
}

/**
 * Builds terminal invocations and parsed outputs. A role mapped to an array
 * succeeded with those findings; a role mapped to a status string ended there.
 */
export function outcomes(
  unit: WorkUnit,
  byRole: Partial<Record<Role, RawFinding[] | Exclude<InvocationStatus, "Succeeded" | "Pending" | "Running">>>,
  healthScores: Partial<Record<Role, number>> = {}
): { invocations: Invocation[]; parsed: Map<Role, ParsedOutput> } {
  const invocations: Invocation[] = [];
  const parsed = new Map<Role, ParsedOutput>();
  for (const assignment of makeRoster(unit)) {
    const entry = byRole[assignment.role] ?? [];
    const base = { workUnitId: unit.id, role: assignment.role, attemptCount: 1, attempts: [] };
    if (typeof entry === "string") {
      invocations.push({ ...base, status: entry });
      continue;
    }
    invocations.push({ ...base, status: "Succeeded", rawOutput: "{}" });
    const score = healthScores[assignment.role];
    parsed.set(assignment.role, {
      stage: "strict",
      findings: entry,
      mutations: [],
      ...(score !== undefined ? { healthScore: score } : {}),
    });
  }
  return { invocations, parsed };
}
