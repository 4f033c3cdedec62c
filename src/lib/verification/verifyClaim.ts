/**
 * Mutation-claim verification.
 *
 *   Unverified → Verifying → Verified
 *                          → Mismatched → (delay, optional re-apply) → Verifying ...
 *                          → Escalated   once the retry budget is spent
 *
 * The worker's own "done" is never trusted: each attempt re-reads the target
 * through a GroundTruthChecker. A checker error counts as a mismatch and its
 * message becomes evidence; so does a check that outlives checkTimeoutMs or
 * the run signal. Escalation never throws; the run carries on.
 */

// ─── src/lib/verification/verifyClaim.ts ────────────────────────────────────

import { VerificationMismatch, errorMessage } from "../../errors.js";
import type {
  ClaimState,
  EscalationReport,
  ExpectedSignal,
  MutationClaim,
  VerificationResult,
} from "../../types.js";
import { debugLog } from "../../utils/debug.js";
import { sleep } from "../execution/limiter.js";
import type { GroundTruthChecker } from "./groundTruth.js";

export const DEFAULT_VERIFICATION_RETRIES = 2;
export const DEFAULT_CHECK_TIMEOUT_MS = 60_000;

export interface VerifyContext {
  checker: GroundTruthChecker;
  /** Retries after the first check; 2 means three attempts. */
  retries?: number;
  delayMs?: number;
  /** Upper bound on one ground-truth check; a check that runs longer counts as a check error. */
  checkTimeoutMs?: number;
  /** Re-runs the mutating action before each retry, when the caller can. */
  reapply?: (claim: MutationClaim, attempt: number) => Promise<void>;
  signal?: AbortSignal;
  onTransition?: (claim: MutationClaim, state: ClaimState) => void;
}

export interface VerificationOutcome {
  result: VerificationResult;
  escalation?: EscalationReport;
}

type AttemptVerdict = { kind: "observed" } | { kind: "mismatch" } | { kind: "error"; message: string };

const MISMATCH_DIAGNOSIS: Record<ExpectedSignal["kind"], string> = {
  exists: "Target never appeared; the claimed write did not land or went to another path",
  absent: "Target is still present after every attempt",
  contains: "Target content never matched the expected pattern",
  modified: "No working-tree change recorded for the target",
  unmodified: "Target shows changes the worker claimed not to make",
};

export function describeSignal(signal: ExpectedSignal): string {
  return signal.kind === "contains" ? `contains "${signal.pattern}"` : signal.kind;
}

function diagnose(claim: MutationClaim, verdicts: AttemptVerdict[]): string {
  const errors = verdicts.filter((v): v is Extract<AttemptVerdict, { kind: "error" }> => v.kind === "error");
  if (errors.length === verdicts.length && errors.length > 0) {
    return `Ground-truth check failed on every attempt: ${errors[errors.length - 1].message}`;
  }
  const base = MISMATCH_DIAGNOSIS[claim.expectedSignal.kind];
  return errors.length > 0 ? `${base} (${errors.length} check error(s))` : base;
}

/**
 * One ground-truth read, bounded by the check timeout and the run signal.
 * A late answer from an abandoned check is ignored.
 */
function runCheck(claim: MutationClaim, ctx: VerifyContext): Promise<AttemptVerdict> {
  const timeoutMs = ctx.checkTimeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;
  const signal = ctx.signal;
  return new Promise((resolve) => {
    let settled = false;

    const finish = (verdict: AttemptVerdict) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve(verdict);
    };

    const onAbort = () => finish({ kind: "error", message: "check cancelled" });

    const timer = setTimeout(
      () => finish({ kind: "error", message: `check timed out after ${timeoutMs}ms` }),
      timeoutMs
    );

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    void Promise.resolve()
      .then(() => ctx.checker.check(claim.targetResource, claim.expectedSignal))
      .then(
        (observed) => finish(observed ? { kind: "observed" } : { kind: "mismatch" }),
        (err: unknown) => finish({ kind: "error", message: errorMessage(err) })
      );
  });
}

export async function verifyClaim(claim: MutationClaim, ctx: VerifyContext): Promise<VerificationOutcome> {
  const retries = ctx.retries ?? DEFAULT_VERIFICATION_RETRIES;
  const maxAttempts = 1 + retries;
  const evidence: string[] = [];
  const verdicts: AttemptVerdict[] = [];
  const transition = (state: ClaimState) => {
    debugLog(`[Verify] ${claim.targetResource}: ${state}`);
    ctx.onTransition?.(claim, state);
  };

  let cancelled = false;
  transition("Unverified");
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1) {
      await sleep(ctx.delayMs ?? 0, ctx.signal);
      if (ctx.signal?.aborted) {
        evidence.push(`${claim.targetResource}: verification cancelled before attempt ${attempt}`);
        cancelled = true;
        break;
      }
      if (ctx.reapply) {
        try {
          await ctx.reapply(claim, attempt);
        } catch (err) {
          evidence.push(`${claim.targetResource}: re-apply failed before attempt ${attempt}: ${errorMessage(err)}`);
        }
      }
    }

    transition("Verifying");
    const verdict = await runCheck(claim, ctx);
    verdicts.push(verdict);

    if (verdict.kind === "observed") {
      evidence.push(`${claim.targetResource}: ${describeSignal(claim.expectedSignal)} observed (attempt ${attempt})`);
      transition("Verified");
      return { result: { claim, verified: true, state: "Verified", attempts: attempt, evidence } };
    }

    evidence.push(
      verdict.kind === "error"
        ? `${claim.targetResource}: check error (attempt ${attempt}): ${verdict.message}`
        : new VerificationMismatch(claim, attempt).message
    );
    transition("Mismatched");
  }

  const attempts = verdicts.length;
  const diagnosis = cancelled ? "Verification cancelled before the retry budget was spent" : diagnose(claim, verdicts);
  transition("Escalated");
  console.warn(
    `[Verify] Escalated ${claim.invocation.workUnitId}/${claim.invocation.role} claim on ${claim.targetResource} after ${attempts} attempt(s): ${diagnosis}`
  );
  return {
    result: { claim, verified: false, state: "Escalated", attempts, evidence },
    escalation: { claim, attempts, evidenceTrail: [...evidence], diagnosis },
  };
}

/** Verifies claims concurrently; one escalation never blocks the others. */
export function verifyClaims(claims: readonly MutationClaim[], ctx: VerifyContext): Promise<VerificationOutcome[]> {
  return Promise.all(claims.map((c) => verifyClaim(c, ctx)));
}
