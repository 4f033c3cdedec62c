/**
 * Per-WorkUnit consensus. Pure over the unit's terminal invocations:
 *
 *   denominator  = Σ voteWeight of surviving (Succeeded + parsed) invocations
 *   consensusPct = 100 × Σ voteWeight of roles that raised the finding / denominator
 *
 * Critical needs every surviving role. Everything below its severity threshold
 * is kept as minority. A unit with a single survivor is Degraded and all of its
 * findings are minority ("single_voice").
 */

// ─── src/lib/consensus/aggregateVotes.ts ────────────────────────────────────

import {
  SEVERITIES,
  type CoverageStatus,
  type Finding,
  type Invocation,
  type MinorityReason,
  type ParsedOutput,
  type RawFinding,
  type Role,
  type Severity,
  type UnitCoverage,
  type VoteTally,
  type WorkUnit,
  type WorkUnitTally,
  type WorkerAssignment,
} from "../../types.js";
import type { SeverityThresholds } from "../schemas/sweep.js";
import { isSameFinding } from "./similarity.js";

/** Slack for threshold comparisons on float percentages. */
export const PCT_EPSILON = 1e-9;

export interface AggregateInput {
  unit: WorkUnit;
  roster: readonly WorkerAssignment[];
  invocations: readonly Invocation[];
  parsed: ReadonlyMap<Role, ParsedOutput>;
  thresholds: SeverityThresholds;
  similarityThreshold: number;
}

interface Cluster {
  members: Array<{ role: Role; finding: RawFinding }>;
  roles: Set<Role>;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function severityRank(severity: Severity): number {
  // 0 = Critical
  return SEVERITIES.indexOf(severity);
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return severityRank(a) <= severityRank(b) ? a : b;
}

export function coverageStatus(surviving: number, assigned: number): CoverageStatus {
  if (surviving === 0) return "Skipped";
  if (surviving === 1) return "Degraded";
  return surviving === assigned ? "Full" : "Partial";
}

function rolesWithStatus(invocations: readonly Invocation[], status: Invocation["status"]): Role[] {
  return invocations.filter((i) => i.status === status).map((i) => i.role);
}

function clusterFindings(
  survivors: readonly Role[],
  parsed: ReadonlyMap<Role, ParsedOutput>,
  similarityThreshold: number
): Cluster[] {
  const clusters: Cluster[] = [];
  for (const role of survivors) {
    for (const finding of parsed.get(role)?.findings ?? []) {
      const match = clusters.find((c) => c.members.some((m) => isSameFinding(m.finding, finding, similarityThreshold)));
      if (match) {
        match.members.push({ role, finding });
        match.roles.add(role);
      } else {
        clusters.push({ members: [{ role, finding }], roles: new Set([role]) });
      }
    }
  }
  return clusters;
}

// ─── Coverage ────────────────────────────────────────────────────────────────

export function unitCoverage(input: Pick<AggregateInput, "unit" | "roster" | "invocations" | "parsed">): UnitCoverage {
  const { unit, roster, invocations, parsed } = input;
  const weightOf = new Map(roster.map((a) => [a.role, a.voteWeight]));
  const surviving = invocations.filter((i) => i.status === "Succeeded" && parsed.has(i.role)).map((i) => i.role);
  const survivingWeight = surviving.reduce((sum, r) => sum + (weightOf.get(r) ?? 0), 0);

  const scores = surviving.flatMap((r) => {
    const s = parsed.get(r)?.healthScore;
    return s === undefined ? [] : [s];
  });

  return {
    workUnitId: unit.id,
    label: unit.label,
    status: coverageStatus(surviving.length, roster.length),
    assignedRoles: roster.map((a) => a.role),
    survivingRoles: surviving,
    malformedRoles: rolesWithStatus(invocations, "Malformed"),
    timedOutRoles: rolesWithStatus(invocations, "TimedOut"),
    failedRoles: rolesWithStatus(invocations, "Failed"),
    survivingWeight,
    ...(scores.length > 0
      ? { healthScore: Math.round((scores.reduce((a, b) => a + b, 0) / scores.length) * 10) / 10 }
      : {}),
  };
}

// ─── Main ────────────────────────────────────────────────────────────────────

export function aggregateWorkUnit(input: AggregateInput): WorkUnitTally {
  const { unit, roster, parsed, thresholds, similarityThreshold } = input;
  const coverage = unitCoverage(input);
  const weightOf = new Map(roster.map((a) => [a.role, a.voteWeight]));
  const rosterOrder = new Map(roster.map((a, i) => [a.role, i]));
  const survivors = coverage.survivingRoles;
  const denominator = coverage.survivingWeight;

  const tallies: VoteTally[] = clusterFindings(survivors, parsed, similarityThreshold).map((cluster) => {
    const sourceRoles = [...cluster.roles].sort((a, b) => (rosterOrder.get(a) ?? 0) - (rosterOrder.get(b) ?? 0));
    const weightedScore = sourceRoles.reduce((sum, r) => sum + (weightOf.get(r) ?? 0), 0);
    const consensusPct = denominator > 0 ? (100 * weightedScore) / denominator : 0;
    const severity = cluster.members.reduce<Severity>((s, m) => maxSeverity(s, m.finding.severity), "Info");

    // text from the heaviest contributor; roster order breaks ties
    const lead = [...sourceRoles].sort((a, b) => (weightOf.get(b) ?? 0) - (weightOf.get(a) ?? 0))[0];
    const leadFinding = cluster.members.find((m) => m.role === lead)?.finding ?? cluster.members[0].finding;

    const finding: Finding = {
      workUnitId: unit.id,
      severity,
      location: leadFinding.location,
      description: leadFinding.description,
      recommendation:
        leadFinding.recommendation || (cluster.members.find((m) => m.finding.recommendation)?.finding.recommendation ?? ""),
      sourceRoles,
    };

    const unanimous = sourceRoles.length === survivors.length;
    let accepted: boolean;
    let minorityReason: MinorityReason | undefined;
    if (survivors.length < 2) {
      accepted = false;
      minorityReason = "single_voice";
    } else if (severity === "Critical") {
      accepted = unanimous || consensusPct + PCT_EPSILON >= thresholds.Critical;
      if (!accepted) minorityReason = "not_unanimous";
    } else {
      accepted = consensusPct + PCT_EPSILON >= thresholds[severity];
      if (!accepted) minorityReason = "below_threshold";
    }

    return {
      finding,
      weightedScore,
      consensusPct,
      accepted,
      ...(minorityReason ? { minorityReason } : {}),
    };
  });

  return { workUnitId: unit.id, coverage, tallies };
}
