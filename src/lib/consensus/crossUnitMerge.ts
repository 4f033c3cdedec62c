/**
 * Cross-unit dedup of accepted findings. Findings from different units that
 * share a resource path and overlapping description become one entry; an
 * entry seen in two or more units is cross-cutting and its severity is
 * raised one level (Critical stays Critical). Provenance keeps every origin.
 */

import { SEVERITIES, type ReportedFinding, type Severity, type VoteTally, type WorkUnitTally } from "../../types.js";
import { maxSeverity } from "./aggregateVotes.js";
import { isSameFinding } from "./similarity.js";

export type MergedFinding = Omit<ReportedFinding, "priority">;

interface Member {
  tally: VoteTally;
  unanimous: boolean;
}

export function promoteSeverity(severity: Severity): Severity {
  const i = SEVERITIES.indexOf(severity);
  return SEVERITIES[Math.max(0, i - 1)];
}

function toMerged(members: Member[]): MergedFinding {
  const lead = members.reduce((best, m) => (m.tally.weightedScore > best.tally.weightedScore ? m : best), members[0]);
  const originalSeverity = members.reduce<Severity>((s, m) => maxSeverity(s, m.tally.finding.severity), "Info");
  const crossCutting = new Set(members.map((m) => m.tally.finding.workUnitId)).size >= 2;

  return {
    severity: crossCutting ? promoteSeverity(originalSeverity) : originalSeverity,
    originalSeverity,
    location: lead.tally.finding.location,
    description: lead.tally.finding.description,
    recommendation: lead.tally.finding.recommendation,
    weightedScore: members.reduce((sum, m) => sum + m.tally.weightedScore, 0),
    consensusPct: Math.min(...members.map((m) => m.tally.consensusPct)),
    unanimous: members.every((m) => m.unanimous),
    crossCutting,
    provenance: members.map((m) => ({
      workUnitId: m.tally.finding.workUnitId,
      sourceRoles: [...m.tally.finding.sourceRoles],
      consensusPct: m.tally.consensusPct,
    })),
  };
}

export function mergeAcrossUnits(units: readonly WorkUnitTally[], similarityThreshold: number): MergedFinding[] {
  const groups: Member[][] = [];

  for (const unit of units) {
    const survivors = unit.coverage.survivingRoles.length;
    for (const tally of unit.tallies) {
      if (!tally.accepted) continue;
      const member: Member = { tally, unanimous: tally.finding.sourceRoles.length === survivors };
      const group = groups.find(
        (g) =>
          !g.some((m) => m.tally.finding.workUnitId === unit.workUnitId) &&
          g.some((m) => isSameFinding(m.tally.finding, tally.finding, similarityThreshold))
      );
      if (group) group.push(member);
      else groups.push([member]);
    }
  }

  return groups.map(toMerged);
}
