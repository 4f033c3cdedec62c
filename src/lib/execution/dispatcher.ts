/**
 * Dispatcher: one invocation per (WorkUnit, WorkerAssignment) pair, bounded
 * by a shared limiter. Each attempt has a hard timeout; a timed-out attempt
 * gives its slot back at once and its worker is told to stop via AbortSignal.
 * Timeouts and errors get `retryBudget` retries after a fixed backoff.
 * Run cancellation ends queued and in-flight invocations as Failed.
 */

// ─── src/lib/execution/dispatcher.ts ────────────────────────────────────────

import { InvocationCancelled, InvocationTimeout, errorMessage } from "../../errors.js";
import { debugLog } from "../../utils/debug.js";
import type {
  AttemptOutcome,
  Invocation,
  InvocationStatus,
  Role,
  WorkUnit,
  WorkerAssignment,
} from "../../types.js";
import { createLimiter, sleep } from "./limiter.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface WorkerInvoker {
  invoke(unit: WorkUnit, role: Role, promptPayload: string, signal: AbortSignal): Promise<string>;
}

export interface DispatchTask {
  unit: WorkUnit;
  assignment: WorkerAssignment;
  promptPayload: string;
}

export interface DispatchOptions {
  concurrencyLimit: number;
  invocationTimeoutMs: number;
  retryBudget: number;
  retryBackoffMs: number;
  /** Run-level cancellation. */
  signal?: AbortSignal;
  /** Called once per invocation as soon as it reaches a terminal status. */
  onSettled?: (invocation: Invocation) => void;
}

interface AttemptResult {
  outcome: AttemptOutcome;
  rawOutput?: string;
  error?: string;
}

const TERMINAL_BY_OUTCOME: Record<Exclude<AttemptOutcome, "ok">, InvocationStatus> = {
  timeout: "TimedOut",
  error: "Failed",
  cancelled: "Failed",
};

// ─── Single attempt ──────────────────────────────────────────────────────────

function runAttempt(task: DispatchTask, invoker: WorkerInvoker, timeoutMs: number, runSignal?: AbortSignal): Promise<AttemptResult> {
  const { unit, assignment, promptPayload } = task;
  return new Promise((resolve) => {
    const controller = new AbortController();
    let settled = false;

    const finish = (result: AttemptResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      runSignal?.removeEventListener("abort", onRunAbort);
      resolve(result);
    };

    const onRunAbort = () => {
      const reason = new InvocationCancelled();
      controller.abort(reason);
      finish({ outcome: "cancelled", error: reason.message });
    };

    const timer = setTimeout(() => {
      const reason = new InvocationTimeout(unit.id, assignment.role, timeoutMs);
      controller.abort(reason);
      finish({ outcome: "timeout", error: reason.message });
    }, timeoutMs);

    if (runSignal?.aborted) {
      onRunAbort();
      return;
    }
    runSignal?.addEventListener("abort", onRunAbort, { once: true });

    void Promise.resolve()
      .then(() => invoker.invoke(unit, assignment.role, promptPayload, controller.signal))
      .then(
        (rawOutput) => finish({ outcome: "ok", rawOutput }),
        (err: unknown) => finish({ outcome: "error", error: errorMessage(err) })
      );
  });
}

// ─── Main ────────────────────────────────────────────────────────────────────

export async function dispatchInvocations(
  tasks: readonly DispatchTask[],
  invoker: WorkerInvoker,
  options: DispatchOptions
): Promise<Invocation[]> {
  const limiter = createLimiter(options.concurrencyLimit);
  const { signal } = options;

  const runOne = async (task: DispatchTask): Promise<Invocation> => {
    const invocation: Invocation = {
      workUnitId: task.unit.id,
      role: task.assignment.role,
      status: "Pending",
      attemptCount: 0,
      attempts: [],
    };
    const maxAttempts = 1 + options.retryBudget;

    while (invocation.attemptCount < maxAttempts) {
      const result = await limiter.run<AttemptResult>(async () => {
        if (signal?.aborted) {
          return { outcome: "cancelled", error: new InvocationCancelled().message };
        }
        invocation.status = "Running";
        invocation.attemptCount++;
        const started = Date.now();
        const r = await runAttempt(task, invoker, options.invocationTimeoutMs, signal);
        invocation.attempts.push({
          attempt: invocation.attemptCount,
          outcome: r.outcome,
          durationMs: Date.now() - started,
          ...(r.error != null ? { error: r.error } : {}),
        });
        return r;
      });

      debugLog(
        `[Dispatcher] ${invocation.workUnitId}/${invocation.role} attempt ${invocation.attemptCount}: ${result.outcome}`
      );

      if (result.outcome === "ok") {
        invocation.status = "Succeeded";
        invocation.rawOutput = result.rawOutput;
        delete invocation.error;
        break;
      }

      invocation.status = TERMINAL_BY_OUTCOME[result.outcome];
      invocation.error = result.error;
      if (result.outcome === "cancelled") break;
      if (invocation.attemptCount >= maxAttempts) break;

      // back in the queue until the retry starts
      invocation.status = "Pending";
      await sleep(options.retryBackoffMs, signal);
      if (signal?.aborted) {
        invocation.status = "Failed";
        invocation.error = new InvocationCancelled().message;
        break;
      }
    }

    if (invocation.status !== "Succeeded") {
      console.warn(
        `[Dispatcher] ${invocation.workUnitId}/${invocation.role} ${invocation.status} after ${invocation.attemptCount} attempt(s): ${invocation.error ?? "unknown error"}`
      );
    }
    options.onSettled?.(invocation);
    return invocation;
  };

  return Promise.all(tasks.map((t) => runOne(t)));
}
