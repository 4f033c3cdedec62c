/**
 * Sweep coordinator: the run entry point.
 *
 *   resolve config → partition → roster per unit → dispatch (bounded pool)
 *     → parse each terminal invocation → verify its claimed mutations
 *     → aggregate each unit once its roster is terminal
 *     → cross-unit merge + report synthesis → JSONL run log
 *
 * Unit-local failures only show up in coverage and stats. The run fails
 * only on ConfigurationError (before dispatch) or CoverageCollapseError
 * (no unit reached two surviving roles).
 */

// ─── src/runSweep.ts ────────────────────────────────────────────────────────

import { randomUUID } from "crypto";
import { resolveRunConfig } from "./config.js";
import { CoverageCollapseError, MalformedOutput, errorMessage } from "./errors.js";
import { aggregateWorkUnit } from "./lib/consensus/aggregateVotes.js";
import { dispatchInvocations, type DispatchTask, type WorkerInvoker } from "./lib/execution/dispatcher.js";
import { WorkUnitArena } from "./lib/execution/workUnitArena.js";
import { parseWorkerOutput } from "./lib/parsing/outputParser.js";
import { partitionCorpus } from "./lib/planning/partitionCorpus.js";
import { rosterFor } from "./lib/planning/roster.js";
import {
  MIN_SURVIVORS_FOR_COVERAGE,
  computeInvocationStats,
  synthesizeReport,
} from "./lib/report/synthesizeReport.js";
import type { Corpus, RunConfig, RunConfigOverrides } from "./lib/schemas/sweep.js";
import { createDefaultChecker, type GroundTruthChecker } from "./lib/verification/groundTruth.js";
import { verifyClaims, type VerificationOutcome, type VerifyContext } from "./lib/verification/verifyClaim.js";
import { appendJsonl, getSweepLogPath } from "./logger.js";
import type { RunLogEvent } from "./runLog.js";
import type {
  FinalReport,
  Invocation,
  ParseStage,
  ParsedOutput,
  Role,
  WorkUnit,
  WorkUnitTally,
} from "./types.js";
import { debugLog } from "./utils/debug.js";

export interface RunSweepOptions {
  invoker: WorkerInvoker;
  /** Defaults to file + git-status checks rooted at the working directory. */
  checker?: GroundTruthChecker;
  config?: RunConfigOverrides;
  /** File/env layers; defaults to the cached process-wide base config. */
  baseConfig?: RunConfigOverrides;
  signal?: AbortSignal;
  runId?: string;
  now?: () => Date;
  buildPrompt?: (unit: WorkUnit, role: Role) => string;
  reapply?: VerifyContext["reapply"];
  /** JSONL run log target; null disables the log line. */
  logPath?: string | null;
}

export interface SweepRun {
  report: FinalReport;
  config: RunConfig;
  invocations: Invocation[];
}

/** Minimal payload: unit identity, resources and role. */
export function defaultPromptPayload(unit: WorkUnit, role: Role): string {
  return JSON.stringify({
    workUnit: { id: unit.id, label: unit.label, resources: unit.resourcePatterns },
    role,
  });
}

function finalStatus(report: FinalReport, collapsed: boolean): RunLogEvent["final"]["status"] {
  if (collapsed) return "coverage_collapse";
  return report.warning ? "incomplete" : "ok";
}

function buildRunLogEvent(report: FinalReport, durationMs: number, collapsed: boolean): RunLogEvent {
  const accepted = Object.values(report.priorities).flat();
  return {
    runId: report.runId,
    ts: report.generatedAtISO,
    durationMs,
    workUnits: report.coverage.units.length,
    stats: report.stats,
    coverage: {
      overallPct: report.coverage.overallPct,
      units: report.coverage.units.map((u) => ({
        workUnitId: u.workUnitId,
        status: u.status,
        survivingRoles: u.survivingRoles.length,
        assignedRoles: u.assignedRoles.length,
      })),
    },
    findings: {
      accepted: accepted.length,
      minority: report.minority.length,
      crossCutting: accepted.filter((f) => f.crossCutting).length,
    },
    verifications: report.verifications,
    final: {
      status: finalStatus(report, collapsed),
      ...(report.warning ? { warning: report.warning.code } : {}),
    },
  };
}

// ─── Main ────────────────────────────────────────────────────────────────────

/**
 * Runs one sweep and returns the report with the resolved config and every
 * terminal invocation. Throws CoverageCollapseError carrying the best-effort
 * report when no unit reached two surviving roles.
 */
export async function executeSweep(corpus: Corpus, options: RunSweepOptions): Promise<SweepRun> {
  const started = Date.now();
  const runId = options.runId ?? randomUUID();
  const now = options.now ?? (() => new Date());
  const buildPrompt = options.buildPrompt ?? defaultPromptPayload;

  const config = resolveRunConfig(options.config ?? {}, options.baseConfig);
  const units = partitionCorpus(corpus, { oversizeMultiplier: config.oversizeMultiplier });
  const entries = units.map((unit) => ({ unit, roster: rosterFor(unit, config.roleWeights) }));

  const tallies = new Map<string, WorkUnitTally>();
  const parseStages: ParseStage[] = [];
  const pendingVerifications: Array<Promise<VerificationOutcome[]>> = [];
  const verifyCtx: VerifyContext = {
    checker: options.checker ?? createDefaultChecker(),
    retries: config.verificationRetries,
    delayMs: config.verificationDelayMs,
    checkTimeoutMs: config.invocationTimeoutS * 1000,
    ...(options.reapply ? { reapply: options.reapply } : {}),
    ...(options.signal ? { signal: options.signal } : {}),
  };

  const arena = new WorkUnitArena(entries, (settled) => {
    const tally = aggregateWorkUnit({
      ...settled,
      thresholds: config.severityThresholds,
      similarityThreshold: config.similarityThreshold,
    });
    tallies.set(settled.unit.id, tally);
    debugLog(
      `[runSweep] ${settled.unit.id} settled: ${tally.coverage.status} (${tally.coverage.survivingRoles.length}/${settled.roster.length}), ${tally.tallies.length} finding(s)`
    );
  });

  const onSettled = (invocation: Invocation): void => {
    let parsed: ParsedOutput | null = null;
    if (invocation.status === "Succeeded") {
      parsed = parseWorkerOutput(invocation.rawOutput ?? "");
      if (!parsed) {
        invocation.status = "Malformed";
        invocation.error = new MalformedOutput(invocation.workUnitId, invocation.role).message;
        console.warn(`[runSweep] ${invocation.error}`);
      } else {
        parseStages.push(parsed.stage);
        if (parsed.mutations.length > 0) {
          const origin = { workUnitId: invocation.workUnitId, role: invocation.role };
          pendingVerifications.push(
            verifyClaims(
              parsed.mutations.map((m) => ({ ...m, invocation: origin })),
              verifyCtx
            )
          );
        }
      }
    }
    arena.record(invocation, parsed);
  };

  const tasks: DispatchTask[] = entries.flatMap(({ unit, roster }) =>
    roster.map((assignment) => ({ unit, assignment, promptPayload: buildPrompt(unit, assignment.role) }))
  );
  console.log(`[runSweep] ${runId}: ${units.length} work unit(s), ${tasks.length} invocation(s)`);

  const invocations = await dispatchInvocations(tasks, options.invoker, {
    concurrencyLimit: config.concurrencyLimit,
    invocationTimeoutMs: config.invocationTimeoutS * 1000,
    retryBudget: config.retryBudget,
    retryBackoffMs: config.retryBackoffS * 1000,
    ...(options.signal ? { signal: options.signal } : {}),
    onSettled,
  });
  const verifications = (await Promise.all(pendingVerifications)).flat();

  const unitTallies = units.flatMap((u) => {
    const t = tallies.get(u.id);
    return t ? [t] : [];
  });
  const report = synthesizeReport({
    runId,
    generatedAtISO: now().toISOString(),
    units: unitTallies,
    verifications,
    stats: computeInvocationStats(invocations, parseStages),
    minCoveragePct: config.minCoveragePct,
    similarityThreshold: config.similarityThreshold,
  });

  const collapsed = unitTallies.every((t) => t.coverage.survivingRoles.length < MIN_SURVIVORS_FOR_COVERAGE);
  const logPath = options.logPath === undefined ? getSweepLogPath() : options.logPath;
  if (logPath) {
    try {
      await appendJsonl(logPath, buildRunLogEvent(report, Date.now() - started, collapsed));
    } catch (err) {
      console.warn(`[runSweep] Could not append run log to ${logPath}: ${errorMessage(err)}`);
    }
  }

  if (collapsed) {
    console.error(`[runSweep] ${runId}: coverage collapsed across ${units.length} work unit(s)`);
    throw new CoverageCollapseError(report);
  }
  if (report.warning) console.warn(`[runSweep] ${report.warning.code}: ${report.warning.message}`);
  console.log(`[runSweep] ${runId}: done in ${Date.now() - started}ms`);
  return { report, config, invocations };
}

export async function runSweep(corpus: Corpus, options: RunSweepOptions): Promise<FinalReport> {
  const { report } = await executeSweep(corpus, options);
  return report;
}
