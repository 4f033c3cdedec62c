/**
 * Core types for sweeps: work units, roster, invocations, findings, tallies,
 * mutation claims, escalations and the final report.
 */

// ─── Enums ──────────────────────────────────────────────────────────────────

export const SEVERITIES = ["Critical", "High", "Medium", "Low", "Info"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const BASELINE_ROLES = ["quality", "implementation", "design"] as const;
export type Role = "quality" | "implementation" | "design" | "complexity";

export type InvocationStatus =
  | "Pending"
  | "Running"
  | "Succeeded"
  | "TimedOut"
  | "Failed"
  | "Malformed";

export type CoverageStatus = "Full" | "Partial" | "Degraded" | "Skipped";

export type Priority = "P1" | "P2" | "P3" | "P4" | "P5";

export type ParseStage = "strict" | "sections" | "line_items";

// ─── Partitioning & roster ──────────────────────────────────────────────────

export interface WorkUnit {
  readonly id: string;
  readonly label: string;
  readonly resourcePatterns: readonly string[];
  readonly estimatedSize: number;
  readonly isOversized: boolean;
}

export interface WorkerAssignment {
  workUnitId: string;
  role: Role;
  voteWeight: number;
  appliesOnlyIfOversized: boolean;
}

// ─── Dispatch ───────────────────────────────────────────────────────────────

export type AttemptOutcome = "ok" | "timeout" | "error" | "cancelled";

export interface InvocationAttempt {
  attempt: number;
  outcome: AttemptOutcome;
  durationMs: number;
  error?: string;
}

export interface Invocation {
  workUnitId: string;
  role: Role;
  status: InvocationStatus;
  attemptCount: number;
  rawOutput?: string;
  error?: string;
  attempts: InvocationAttempt[];
}

// ─── Findings & votes ───────────────────────────────────────────────────────

export interface Finding {
  workUnitId: string;
  severity: Severity;
  location: string;
  description: string;
  recommendation: string;
  sourceRoles: Role[];
}

/** Finding as raised by a single worker, before attribution. */
export interface RawFinding {
  severity: Severity;
  location: string;
  description: string;
  recommendation: string;
}

export type MinorityReason = "below_threshold" | "not_unanimous" | "single_voice";

export interface VoteTally {
  finding: Finding;
  weightedScore: number;
  /** 0..100 share of the unit's surviving vote weight. */
  consensusPct: number;
  accepted: boolean;
  minorityReason?: MinorityReason;
}

// ─── Mutation claims & verification ─────────────────────────────────────────

export type ExpectedSignal =
  | { kind: "exists" }
  | { kind: "absent" }
  | { kind: "contains"; pattern: string }
  | { kind: "modified" }
  | { kind: "unmodified" };

export interface ClaimedMutation {
  targetResource: string;
  expectedSignal: ExpectedSignal;
}

export interface MutationClaim extends ClaimedMutation {
  invocation: { workUnitId: string; role: Role };
}

export type ClaimState = "Unverified" | "Verifying" | "Verified" | "Mismatched" | "Escalated";

export interface VerificationResult {
  claim: MutationClaim;
  verified: boolean;
  state: "Verified" | "Escalated";
  attempts: number;
  evidence: string[];
}

export interface EscalationReport {
  claim: MutationClaim;
  attempts: number;
  evidenceTrail: string[];
  diagnosis: string;
}

// ─── Parsed worker output ───────────────────────────────────────────────────

export interface ParsedOutput {
  stage: ParseStage;
  findings: RawFinding[];
  healthScore?: number;
  mutations: ClaimedMutation[];
}

// ─── Per-unit aggregation ───────────────────────────────────────────────────

export interface UnitCoverage {
  workUnitId: string;
  label: string;
  status: CoverageStatus;
  assignedRoles: Role[];
  survivingRoles: Role[];
  malformedRoles: Role[];
  timedOutRoles: Role[];
  failedRoles: Role[];
  /** Sum of vote weights of surviving roles; the consensus denominator. */
  survivingWeight: number;
  healthScore?: number;
}

export interface WorkUnitTally {
  workUnitId: string;
  coverage: UnitCoverage;
  tallies: VoteTally[];
}

// ─── Final report ───────────────────────────────────────────────────────────

export interface FindingProvenance {
  workUnitId: string;
  sourceRoles: Role[];
  consensusPct: number;
}

export interface ReportedFinding {
  severity: Severity;
  /** Severity before cross-cutting promotion. */
  originalSeverity: Severity;
  location: string;
  description: string;
  recommendation: string;
  priority: Priority;
  weightedScore: number;
  consensusPct: number;
  unanimous: boolean;
  crossCutting: boolean;
  provenance: FindingProvenance[];
}

export interface MinorityFinding {
  workUnitId: string;
  severity: Severity;
  location: string;
  description: string;
  recommendation: string;
  sourceRoles: Role[];
  weightedScore: number;
  consensusPct: number;
  reason: MinorityReason;
}

export interface ReportWarning {
  code: "INCOMPLETE_ANALYSIS";
  message: string;
  workUnitIds: string[];
}

export interface InvocationStats {
  total: number;
  byStatus: Record<InvocationStatus, number>;
  retried: number;
  byParseStage: Record<ParseStage, number>;
}

export interface FinalReport {
  runId: string;
  generatedAtISO: string;
  warning?: ReportWarning;
  coverage: {
    overallPct: number;
    minCoveragePct: number;
    units: UnitCoverage[];
  };
  priorities: Record<Priority, ReportedFinding[]>;
  minority: MinorityFinding[];
  escalations: EscalationReport[];
  verifications: { verified: number; escalated: number };
  stats: InvocationStats;
}
