/**
 * Report synthesizer: one deterministic pass over unit tallies, verification
 * outcomes and invocation records.
 *
 * Priority = f(severity, consensus):
 *   Critical + unanimous → P1    Critical + majority → P2
 *   High + unanimous     → P2    High + majority     → P3
 *   Medium → P4                  Low, Info           → P5
 *
 * Within a tier: weighted score desc, then location, then description.
 */

// ─── src/lib/report/synthesizeReport.ts ─────────────────────────────────────

import { mergeAcrossUnits, type MergedFinding } from "../consensus/crossUnitMerge.js";
import type { VerificationOutcome } from "../verification/verifyClaim.js";
import type {
  FinalReport,
  Invocation,
  InvocationStats,
  MinorityFinding,
  ParseStage,
  Priority,
  ReportWarning,
  ReportedFinding,
  WorkUnitTally,
} from "../../types.js";

export const MIN_SURVIVORS_FOR_COVERAGE = 2;

export interface SynthesizeInput {
  runId: string;
  generatedAtISO: string;
  /** In partition order. */
  units: readonly WorkUnitTally[];
  verifications: readonly VerificationOutcome[];
  stats: InvocationStats;
  minCoveragePct: number;
  similarityThreshold: number;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function priorityFor(finding: Pick<MergedFinding, "severity" | "unanimous">): Priority {
  switch (finding.severity) {
    case "Critical":
      return finding.unanimous ? "P1" : "P2";
    case "High":
      return finding.unanimous ? "P2" : "P3";
    case "Medium":
      return "P4";
    default:
      return "P5";
  }
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareFindings(a: ReportedFinding, b: ReportedFinding): number {
  return (
    b.weightedScore - a.weightedScore ||
    compareText(a.location, b.location) ||
    compareText(a.description, b.description)
  );
}

/** Share (0..100) of units with at least two surviving roles. */
export function overallCoveragePct(units: readonly WorkUnitTally[]): number {
  if (units.length === 0) return 0;
  const covered = units.filter((u) => u.coverage.survivingRoles.length >= MIN_SURVIVORS_FOR_COVERAGE).length;
  return (100 * covered) / units.length;
}

export function computeInvocationStats(
  invocations: readonly Invocation[],
  parseStages: readonly ParseStage[]
): InvocationStats {
  const byStatus: InvocationStats["byStatus"] = {
    Pending: 0,
    Running: 0,
    Succeeded: 0,
    TimedOut: 0,
    Failed: 0,
    Malformed: 0,
  };
  const byParseStage: InvocationStats["byParseStage"] = { strict: 0, sections: 0, line_items: 0 };
  for (const inv of invocations) byStatus[inv.status]++;
  for (const stage of parseStages) byParseStage[stage]++;
  return {
    total: invocations.length,
    byStatus,
    retried: invocations.filter((i) => i.attemptCount > 1).length,
    byParseStage,
  };
}

function buildWarning(units: readonly WorkUnitTally[], overallPct: number, minCoveragePct: number): ReportWarning | undefined {
  if (overallPct >= minCoveragePct) return undefined;
  const lacking = units
    .filter((u) => u.coverage.status === "Degraded" || u.coverage.status === "Skipped")
    .map((u) => u.workUnitId);
  return {
    code: "INCOMPLETE_ANALYSIS",
    message:
      `Only ${overallPct.toFixed(1)}% of work units reached minimum coverage (threshold ${minCoveragePct}%).` +
      (lacking.length > 0 ? ` Degraded or skipped: ${lacking.join(", ")}` : ""),
    workUnitIds: lacking,
  };
}

// ─── Main ────────────────────────────────────────────────────────────────────

export function synthesizeReport(input: SynthesizeInput): FinalReport {
  const { units, verifications } = input;

  const priorities: Record<Priority, ReportedFinding[]> = { P1: [], P2: [], P3: [], P4: [], P5: [] };
  for (const merged of mergeAcrossUnits(units, input.similarityThreshold)) {
    const priority = priorityFor(merged);
    priorities[priority].push({ ...merged, priority });
  }
  for (const tier of Object.values(priorities)) tier.sort(compareFindings);

  const minority: MinorityFinding[] = units.flatMap((u) =>
    u.tallies
      .filter((t) => !t.accepted)
      .map((t) => ({
        workUnitId: u.workUnitId,
        severity: t.finding.severity,
        location: t.finding.location,
        description: t.finding.description,
        recommendation: t.finding.recommendation,
        sourceRoles: [...t.finding.sourceRoles],
        weightedScore: t.weightedScore,
        consensusPct: t.consensusPct,
        reason: t.minorityReason ?? "below_threshold",
      }))
  );

  const overallPct = overallCoveragePct(units);
  const warning = buildWarning(units, overallPct, input.minCoveragePct);

  return {
    runId: input.runId,
    generatedAtISO: input.generatedAtISO,
    ...(warning ? { warning } : {}),
    coverage: {
      overallPct,
      minCoveragePct: input.minCoveragePct,
      units: units.map((u) => u.coverage),
    },
    priorities,
    minority,
    escalations: verifications.flatMap((v) => (v.escalation ? [v.escalation] : [])),
    verifications: {
      verified: verifications.filter((v) => v.result.verified).length,
      escalated: verifications.filter((v) => !v.result.verified).length,
    },
    stats: input.stats,
  };
}
