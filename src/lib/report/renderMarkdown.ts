/**
 * Markdown rendering of a FinalReport. Pure; the JSON report stays the
 * source of truth.
 */

import type { FinalReport, Priority, ReportedFinding, Severity } from "../../types.js";

const PRIORITY_TITLES: Record<Priority, string> = {
  P1: "P1 · Fix now",
  P2: "P2 · Fix before release",
  P3: "P3 · Schedule",
  P4: "P4 · Improve",
  P5: "P5 · Nice to have",
};

const PRIORITY_ORDER: readonly Priority[] = ["P1", "P2", "P3", "P4", "P5"];

const SEVERITY_MARK: Record<Severity, string> = {
  Critical: "🔴",
  High: "🟠",
  Medium: "🟡",
  Low: "🔵",
  Info: "⚪",
};

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

function renderFinding(f: ReportedFinding): string[] {
  const severity =
    f.severity === f.originalSeverity ? f.severity : `${f.severity} (raised from ${f.originalSeverity})`;
  const lines = [`### ${SEVERITY_MARK[f.severity]} ${severity} · \`${f.location}\``, "", f.description, ""];
  if (f.recommendation) lines.push(`- **Recommendation:** ${f.recommendation}`);
  lines.push(`- **Consensus:** ${pct(f.consensusPct)}${f.unanimous ? " (unanimous)" : ""}`);
  const origins = f.provenance.map((p) => `${p.workUnitId} [${p.sourceRoles.join(", ")}]`).join("; ");
  lines.push(`- **Raised in:** ${origins}${f.crossCutting ? " (cross-cutting)" : ""}`);
  lines.push("");
  return lines;
}

export function renderMarkdown(report: FinalReport): string {
  const out: string[] = ["# Review Sweep Report", ""];

  if (report.warning) {
    out.push(`> **${report.warning.code}**: ${report.warning.message}`, "");
  }

  out.push(`Run \`${report.runId}\` · ${report.generatedAtISO}`, "");

  // ─── Coverage ──────────────────────────────────────────────────────────────
  out.push("## Coverage", "");
  out.push(
    `Overall: ${pct(report.coverage.overallPct)} of work units reached minimum coverage (threshold ${report.coverage.minCoveragePct}%)`,
    ""
  );
  out.push("| Unit | Status | Surviving roles | Health |", "|---|---|---|---|");
  for (const u of report.coverage.units) {
    const roles = u.survivingRoles.length > 0 ? u.survivingRoles.join(", ") : "none";
    const health = u.healthScore === undefined ? "n/a" : u.healthScore.toFixed(1);
    out.push(`| ${u.label} | ${u.status} | ${roles} | ${health} |`);
  }
  out.push("");

  // ─── Findings ──────────────────────────────────────────────────────────────
  const tiers = PRIORITY_ORDER.filter((p) => report.priorities[p].length > 0);
  if (tiers.length === 0) {
    out.push("## Findings", "", "No findings reached consensus.", "");
  }
  for (const tier of tiers) {
    out.push(`## ${PRIORITY_TITLES[tier]} (${report.priorities[tier].length})`, "");
    for (const f of report.priorities[tier]) out.push(...renderFinding(f));
  }

  if (report.minority.length > 0) {
    out.push("## Minority views", "");
    for (const m of report.minority) {
      out.push(
        `- [${m.severity}] \`${m.location}\` (${m.workUnitId}; ${m.sourceRoles.join(", ")}; ${pct(m.consensusPct)}, ${m.reason}): ${m.description}`
      );
    }
    out.push("");
  }

  if (report.escalations.length > 0) {
    out.push("## Escalations", "");
    for (const e of report.escalations) {
      out.push(
        `- \`${e.claim.targetResource}\` (${e.claim.invocation.workUnitId}/${e.claim.invocation.role}), ${e.attempts} attempt(s): ${e.diagnosis}`
      );
      for (const line of e.evidenceTrail) out.push(`  - ${line}`);
    }
    out.push("");
  }

  const { stats } = report;
  out.push("## Invocations", "");
  out.push(
    `${stats.total} total · ${stats.byStatus.Succeeded} succeeded · ${stats.byStatus.TimedOut} timed out · ` +
      `${stats.byStatus.Failed} failed · ${stats.byStatus.Malformed} malformed · ${stats.retried} retried`
  );
  out.push(
    `Verifications: ${report.verifications.verified} verified, ${report.verifications.escalated} escalated`,
    ""
  );

  return out.join("\n");
}
