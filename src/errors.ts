/**
 * Sweep error taxonomy. Only ConfigurationError and CoverageCollapseError
 * abort a run; the others stay local to one invocation or claim.
 */

import type { FinalReport, MutationClaim } from "./types.js";

export type SweepErrorCode =
  | "CONFIGURATION"
  | "INVOCATION_TIMEOUT"
  | "INVOCATION_ERROR"
  | "MALFORMED_OUTPUT"
  | "VERIFICATION_MISMATCH"
  | "COVERAGE_COLLAPSE"
  | "CANCELLED";

export class SweepError extends Error {
  constructor(
    readonly code: SweepErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends SweepError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super("CONFIGURATION", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

export class InvocationTimeout extends SweepError {
  constructor(
    readonly workUnitId: string,
    readonly role: string,
    readonly timeoutMs: number
  ) {
    super("INVOCATION_TIMEOUT", `${workUnitId}/${role} timed out after ${timeoutMs}ms`);
  }
}

export class InvocationError extends SweepError {
  constructor(message: string) {
    super("INVOCATION_ERROR", message);
  }
}

export class InvocationCancelled extends SweepError {
  constructor(reason = "run cancelled") {
    super("CANCELLED", reason);
  }
}

export class MalformedOutput extends SweepError {
  constructor(
    readonly workUnitId: string,
    readonly role: string
  ) {
    super("MALFORMED_OUTPUT", `${workUnitId}/${role}: no decoder stage produced a finding list`);
  }
}

export class VerificationMismatch extends SweepError {
  constructor(
    readonly claim: MutationClaim,
    readonly attempt: number
  ) {
    super(
      "VERIFICATION_MISMATCH",
      `${claim.targetResource}: expected ${claim.expectedSignal.kind} not observed (attempt ${attempt})`
    );
  }
}

/** No work unit reached two surviving roles. Carries the best-effort report. */
export class CoverageCollapseError extends SweepError {
  constructor(readonly report: FinalReport) {
    super(
      "COVERAGE_COLLAPSE",
      `No work unit achieved minimum coverage (${report.coverage.units.length} units analysed)`
    );
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
