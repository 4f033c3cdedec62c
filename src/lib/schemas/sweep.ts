/**
 * Sweep schemas: run configuration, corpus input, strict worker output,
 * HTTP request bodies and the persisted FinalReport.
 */

import { z } from "zod";
import { SEVERITIES } from "../../types.js";

// ─── Enums ─────────────────────────────────────────────────────────────────

export const SeveritySchema = z.enum(SEVERITIES);
export const RoleSchema = z.enum(["quality", "implementation", "design", "complexity"]);
export const CoverageStatusSchema = z.enum(["Full", "Partial", "Degraded", "Skipped"]);
export const MinorityReasonSchema = z.enum(["below_threshold", "not_unanimous", "single_voice"]);
export const SweepStatusSchema = z.enum(["ok", "incomplete", "coverage_collapse"]);

const Pct = z.number().min(0).max(100);
const Weight = z.number().positive().finite();

// ─── Run configuration ─────────────────────────────────────────────────────

export const SeverityThresholdsSchema = z.object({
  Critical: Pct,
  High: Pct,
  Medium: Pct,
  Low: Pct,
  Info: Pct,
});
export type SeverityThresholds = z.infer<typeof SeverityThresholdsSchema>;

export const RoleWeightsSchema = z.object({
  quality: Weight,
  implementation: Weight,
  design: Weight,
  complexity: Weight,
});
export type RoleWeights = z.infer<typeof RoleWeightsSchema>;

const RunConfigObject = z.object({
  concurrencyLimit: z.number().int().min(1).max(1000),
  invocationTimeoutS: z.number().positive(),
  retryBudget: z.number().int().min(0).max(5),
  retryBackoffS: z.number().min(0),
  minCoveragePct: Pct,
  severityThresholds: SeverityThresholdsSchema,
  verificationRetries: z.number().int().min(0).max(10),
  verificationDelayMs: z.number().int().min(0),
  similarityThreshold: z.number().gt(0).max(1),
  oversizeMultiplier: z.number().min(1),
  roleWeights: RoleWeightsSchema,
});

/** Thresholds must relax (never tighten) as severity decreases. */
export const RunConfigSchema = RunConfigObject.superRefine((cfg, ctx) => {
  for (let i = 1; i < SEVERITIES.length; i++) {
    const higher = SEVERITIES[i - 1];
    const lower = SEVERITIES[i];
    if (cfg.severityThresholds[lower] > cfg.severityThresholds[higher]) {
      ctx.addIssue({
        code: "custom",
        path: ["severityThresholds", lower],
        message: `${lower} threshold exceeds ${higher} threshold`,
      });
    }
  }
});
export type RunConfig = z.infer<typeof RunConfigSchema>;

export const RunConfigOverridesSchema = RunConfigObject.omit({
  severityThresholds: true,
  roleWeights: true,
})
  .partial()
  .extend({
    severityThresholds: SeverityThresholdsSchema.partial().optional(),
    roleWeights: RoleWeightsSchema.partial().optional(),
  });
export type RunConfigOverrides = z.infer<typeof RunConfigOverridesSchema>;

// ─── Corpus ────────────────────────────────────────────────────────────────

export const ShardInputSchema = z.object({
  id: z.string().min(1),
  label: z.string().optional(),
  resourcePatterns: z.array(z.string().min(1)).min(1),
  estimatedSize: z.number().int().positive(),
});
export type ShardInput = z.infer<typeof ShardInputSchema>;

export const ResourceInputSchema = z.object({
  path: z.string().min(1),
  size: z.number().int().positive(),
});
export type ResourceInput = z.infer<typeof ResourceInputSchema>;

export const CorpusSchema = z.union([
  z.object({ shards: z.array(ShardInputSchema) }),
  z.object({
    resources: z.array(ResourceInputSchema),
    groupDepth: z.number().int().min(1).optional(),
  }),
]);
export type Corpus = z.infer<typeof CorpusSchema>;

// ─── Strict worker output ──────────────────────────────────────────────────

export const WorkerFindingSchema = z.object({
  severity: z.string().min(1),
  location: z.string().min(1),
  description: z.string().min(1),
  recommendation: z.string().optional(),
});

export const WorkerMutationSchema = z.object({
  target: z.string().min(1),
  signal: z.enum(["exists", "absent", "contains", "modified", "unmodified"]).optional(),
  pattern: z.string().optional(),
});

/** Envelope only; items are validated one by one so one bad item does not sink the rest. */
export const WorkerOutputEnvelopeSchema = z.object({
  findings: z.array(z.unknown()),
  healthScore: z.number().min(0).max(10).optional(),
  health_score: z.number().min(0).max(10).optional(),
  mutations: z.array(z.unknown()).optional(),
  claimed_side_effects: z.array(z.unknown()).optional(),
});

// ─── HTTP ──────────────────────────────────────────────────────────────────

export const SweepRequestSchema = z.object({
  corpus: CorpusSchema,
  config: RunConfigOverridesSchema.optional(),
  modelId: z.string().min(1).optional(),
});
export type SweepRequest = z.infer<typeof SweepRequestSchema>;

// ─── Final report ──────────────────────────────────────────────────────────

const ExpectedSignalSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("exists") }),
  z.object({ kind: z.literal("absent") }),
  z.object({ kind: z.literal("contains"), pattern: z.string() }),
  z.object({ kind: z.literal("modified") }),
  z.object({ kind: z.literal("unmodified") }),
]);

const MutationClaimSchema = z.object({
  invocation: z.object({ workUnitId: z.string(), role: RoleSchema }),
  targetResource: z.string(),
  expectedSignal: ExpectedSignalSchema,
});

const UnitCoverageSchema = z.object({
  workUnitId: z.string(),
  label: z.string(),
  status: CoverageStatusSchema,
  assignedRoles: z.array(RoleSchema),
  survivingRoles: z.array(RoleSchema),
  malformedRoles: z.array(RoleSchema),
  timedOutRoles: z.array(RoleSchema),
  failedRoles: z.array(RoleSchema),
  survivingWeight: z.number(),
  healthScore: z.number().optional(),
});

const ReportedFindingSchema = z.object({
  severity: SeveritySchema,
  originalSeverity: SeveritySchema,
  location: z.string(),
  description: z.string(),
  recommendation: z.string(),
  priority: z.enum(["P1", "P2", "P3", "P4", "P5"]),
  weightedScore: z.number(),
  consensusPct: z.number(),
  unanimous: z.boolean(),
  crossCutting: z.boolean(),
  provenance: z.array(
    z.object({
      workUnitId: z.string(),
      sourceRoles: z.array(RoleSchema),
      consensusPct: z.number(),
    })
  ),
});

const StatusCountsSchema = z.object({
  Pending: z.number(),
  Running: z.number(),
  Succeeded: z.number(),
  TimedOut: z.number(),
  Failed: z.number(),
  Malformed: z.number(),
});

export const FinalReportSchema = z.object({
  runId: z.string(),
  generatedAtISO: z.string(),
  warning: z
    .object({
      code: z.literal("INCOMPLETE_ANALYSIS"),
      message: z.string(),
      workUnitIds: z.array(z.string()),
    })
    .optional(),
  coverage: z.object({
    overallPct: z.number(),
    minCoveragePct: z.number(),
    units: z.array(UnitCoverageSchema),
  }),
  priorities: z.object({
    P1: z.array(ReportedFindingSchema),
    P2: z.array(ReportedFindingSchema),
    P3: z.array(ReportedFindingSchema),
    P4: z.array(ReportedFindingSchema),
    P5: z.array(ReportedFindingSchema),
  }),
  minority: z.array(
    z.object({
      workUnitId: z.string(),
      severity: SeveritySchema,
      location: z.string(),
      description: z.string(),
      recommendation: z.string(),
      sourceRoles: z.array(RoleSchema),
      weightedScore: z.number(),
      consensusPct: z.number(),
      reason: MinorityReasonSchema,
    })
  ),
  escalations: z.array(
    z.object({
      claim: MutationClaimSchema,
      attempts: z.number(),
      evidenceTrail: z.array(z.string()),
      diagnosis: z.string(),
    })
  ),
  verifications: z.object({ verified: z.number(), escalated: z.number() }),
  stats: z.object({
    total: z.number(),
    byStatus: StatusCountsSchema,
    retried: z.number(),
    byParseStage: z.object({ strict: z.number(), sections: z.number(), line_items: z.number() }),
  }),
});

/** Flattens zod issues into "path: message" strings. */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>): string[] {
  return issues.map((i) => {
    const path = i.path.map((p) => String(p)).join(".");
    return path ? `${path}: ${i.message}` : i.message;
  });
}
