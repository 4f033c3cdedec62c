/**
 * Run log event schema for JSONL logging. One event per sweep.
 */

import type { CoverageStatus, InvocationStats, ReportWarning } from "./types.js";

export interface RunLogUnit {
  workUnitId: string;
  status: CoverageStatus;
  survivingRoles: number;
  assignedRoles: number;
}

export interface RunLogEvent {
  runId: string;
  ts: string;
  durationMs: number;
  workUnits: number;
  stats: InvocationStats;
  coverage: {
    overallPct: number;
    units: RunLogUnit[];
  };
  findings: {
    accepted: number;
    minority: number;
    crossCutting: number;
  };
  verifications: { verified: number; escalated: number };
  final: {
    status: "ok" | "incomplete" | "coverage_collapse";
    warning?: ReportWarning["code"];
  };
}
